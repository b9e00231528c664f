import { describe, it, expect } from 'vitest';
import { formatTimestamp, renderCsv, renderJson, renderSrt, renderTxt, renderVtt } from '../../output/formatters';
import type { TranscriptResult } from '../../pipeline/types';
import { sampleResult } from '../helpers';

describe('formatTimestamp', () => {
    it('should format hours, minutes, seconds and milliseconds', () => {
        expect(formatTimestamp(3661.5, ',')).toBe('01:01:01,500');
        expect(formatTimestamp(2.5, '.')).toBe('00:00:02.500');
    });

    it('should carry rounded milliseconds into the next second', () => {
        expect(formatTimestamp(59.9996, '.')).toBe('00:01:00.000');
    });

    it('should clamp negative and non-finite values to zero', () => {
        expect(formatTimestamp(-3, ',')).toBe('00:00:00,000');
        expect(formatTimestamp(Number.NaN, ',')).toBe('00:00:00,000');
    });
});

describe('renderSrt', () => {
    it('should number cues and prefix speakers', () => {
        expect(renderSrt(sampleResult())).toBe(
            '1\n00:00:00,000 --> 00:00:02,500\n[SPEAKER_00] Good morning class\n\n' +
            '2\n00:00:02,500 --> 00:00:04,000\n[SPEAKER_01] Morning\n\n'
        );
    });
});

describe('renderVtt', () => {
    it('should start with the WEBVTT header and use dot separators', () => {
        expect(renderVtt(sampleResult())).toBe(
            'WEBVTT\n\n' +
            '00:00:00.000 --> 00:00:02.500\n[SPEAKER_00] Good morning class\n\n' +
            '00:00:02.500 --> 00:00:04.000\n[SPEAKER_01] Morning\n\n'
        );
    });

    it('should omit the speaker tag when there is none', () => {
        const result: TranscriptResult = { segments: [{ start: 1, end: 2, text: ' Quiet please ' }] };
        expect(renderVtt(result)).toBe('WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nQuiet please\n\n');
    });
});

describe('renderTxt', () => {
    it('should group consecutive segments of one speaker into a paragraph', () => {
        const result: TranscriptResult = {
            segments: [
                { start: 0, end: 1, text: 'Hello', speaker: 'SPEAKER_00' },
                { start: 1, end: 2, text: ' there ', speaker: 'SPEAKER_00' },
                { start: 2, end: 3, text: 'Hi', speaker: 'SPEAKER_01' },
                { start: 3, end: 4, text: '  ', speaker: 'SPEAKER_01' },
                { start: 4, end: 5, text: 'Bye', speaker: 'SPEAKER_00' },
            ],
        };

        expect(renderTxt(result)).toBe('SPEAKER_00:\nHello there\n\nSPEAKER_01:\nHi\n\nSPEAKER_00:\nBye\n');
    });

    it('should join unlabelled text without a speaker line', () => {
        const result: TranscriptResult = {
            segments: [
                { start: 0, end: 1, text: 'one' },
                { start: 1, end: 2, text: 'two' },
            ],
        };
        expect(renderTxt(result)).toBe('one two\n');
    });

    it('should render an empty transcript as an empty file', () => {
        expect(renderTxt({ segments: [] })).toBe('');
    });
});

describe('renderCsv', () => {
    it('should write one row per segment with N/A for missing speakers', () => {
        const result: TranscriptResult = {
            segments: [
                { start: 0, end: 1.5, text: ' Hello, "class" ' },
                { start: 1.5, end: 3, text: 'Hi', speaker: 'SPEAKER_01' },
            ],
        };

        expect(renderCsv(result)).toBe(
            'start_time,end_time,speaker,text\n' +
            '0,1.5,N/A,"Hello, ""class"""\n' +
            '1.5,3,SPEAKER_01,Hi\n'
        );
    });
});

describe('renderJson', () => {
    it('should record the source name, language, speakers and segments', () => {
        const json = renderJson(sampleResult(), 'lesson.mp4');

        expect(json.endsWith('}\n')).toBe(true);
        expect(JSON.parse(json)).toEqual({
            file: 'lesson.mp4',
            language: 'en',
            speakers: ['SPEAKER_00', 'SPEAKER_01'],
            segments: [
                { start: 0, end: 2.5, text: 'Good morning class', speaker: 'SPEAKER_00' },
                { start: 2.5, end: 4, text: 'Morning', speaker: 'SPEAKER_01' },
            ],
        });
    });
});
