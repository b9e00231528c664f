/**
 * Transcript renderers: JSON, SubRip, WebVTT, plain text and CSV
 */

import type { TranscriptResult, TranscriptSegment } from '../pipeline/types';
import { formatCsv } from '../shared/csv';

function pad(value: number, width: number): string {
    return value.toString().padStart(width, '0');
}

/**
 * Seconds -> HH:MM:SS<sep>mmm, rounded to the millisecond
 */
export function formatTimestamp(seconds: number, separator: ',' | '.'): string {
    const totalMs = Number.isFinite(seconds) && seconds > 0 ? Math.round(seconds * 1000) : 0;
    const hours = Math.floor(totalMs / 3_600_000);
    const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
    const secs = Math.floor((totalMs % 60_000) / 1000);
    const ms = totalMs % 1000;
    return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)}${separator}${pad(ms, 3)}`;
}

function cueText(segment: TranscriptSegment): string {
    const text = segment.text.trim();
    return segment.speaker ? `[${segment.speaker}] ${text}` : text;
}

export function renderJson(result: TranscriptResult, sourceName: string): string {
    const document = {
        file: sourceName,
        language: result.language,
        speakers: result.speakers,
        segments: result.segments.map(seg => ({
            start: seg.start,
            end: seg.end,
            text: seg.text.trim(),
            speaker: seg.speaker,
            confidence: seg.confidence,
        })),
    };
    return JSON.stringify(document, null, 2) + '\n';
}

export function renderSrt(result: TranscriptResult): string {
    return result.segments
        .map((seg, i) => `${i + 1}\n${formatTimestamp(seg.start, ',')} --> ${formatTimestamp(seg.end, ',')}\n${cueText(seg)}\n\n`)
        .join('');
}

export function renderVtt(result: TranscriptResult): string {
    const cues = result.segments
        .map(seg => `${formatTimestamp(seg.start, '.')} --> ${formatTimestamp(seg.end, '.')}\n${cueText(seg)}\n\n`)
        .join('');
    return `WEBVTT\n\n${cues}`;
}

/**
 * One paragraph per run of consecutive segments from the same speaker
 */
export function renderTxt(result: TranscriptResult): string {
    const paragraphs: Array<{ speaker?: string; texts: string[] }> = [];

    for (const seg of result.segments) {
        const text = seg.text.trim();
        if (!text) continue;
        const last = paragraphs.at(-1);
        if (last && last.speaker === seg.speaker) {
            last.texts.push(text);
        } else {
            paragraphs.push({ speaker: seg.speaker, texts: [text] });
        }
    }

    if (paragraphs.length === 0) return '';

    return paragraphs
        .map(p => (p.speaker ? `${p.speaker}:\n${p.texts.join(' ')}` : p.texts.join(' ')))
        .join('\n\n') + '\n';
}

export const CSV_COLUMNS = ['start_time', 'end_time', 'speaker', 'text'] as const;

export function renderCsv(result: TranscriptResult): string {
    return formatCsv(CSV_COLUMNS, result.segments.map(seg => ({
        start_time: seg.start,
        end_time: seg.end,
        speaker: seg.speaker ?? 'N/A',
        text: seg.text.trim(),
    })));
}
