/**
 * Descriptive statistics over completed transcripts
 *
 * Writes stats_summary.csv, per_file_stats.csv and per_speaker_stats.csv.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { listCompletedStems } from '../pipeline/completion-registry';
import type { TranscriptSegment } from '../pipeline/types';
import { readTranscriptFile } from '../output/transcript-file';
import { formatCsv } from '../shared/csv';
import { fileExists } from '../shared/fs-utils';
import type { Logger } from '../shared/logger';
import { silentLogger } from '../shared/logger';

export interface FileStats {
    file: string;
    segments: number;
    words: number;
    /** End of the last segment, seconds */
    durationSeconds: number;
    wpm?: number;
}

export interface SpeakerStats {
    speaker: string;
    segments: number;
    words: number;
    /** Sum of segment durations, seconds */
    speakingSeconds: number;
    wpm?: number;
}

export interface StatsSummary {
    totalFiles: number;
    totalSegments: number;
    totalWords: number;
    totalDurationHours: number;
    overallWpm?: number;
}

export interface TranscriptStats {
    summary: StatsSummary;
    perFile: FileStats[];
    perSpeaker: SpeakerStats[];
}

export const STATS_FILES = {
    summary: 'stats_summary.csv',
    perFile: 'per_file_stats.csv',
    perSpeaker: 'per_speaker_stats.csv',
} as const;

export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}

function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

function wordsPerMinute(words: number, seconds: number): number | undefined {
    return seconds > 0 ? round(words / (seconds / 60), 1) : undefined;
}

/**
 * Aggregate per file, per speaker and overall
 */
export function computeStats(transcripts: Array<{ file: string; segments: TranscriptSegment[] }>): TranscriptStats {
    const perFile: FileStats[] = [];
    const speakers = new Map<string, { segments: number; words: number; seconds: number }>();
    let totalSegments = 0;
    let totalWords = 0;
    let totalSeconds = 0;

    for (const transcript of transcripts) {
        let words = 0;
        let duration = 0;

        for (const seg of transcript.segments) {
            const segWords = countWords(seg.text);
            words += segWords;
            duration = Math.max(duration, seg.end);

            if (seg.speaker) {
                const entry = speakers.get(seg.speaker) ?? { segments: 0, words: 0, seconds: 0 };
                entry.segments++;
                entry.words += segWords;
                entry.seconds += Math.max(0, seg.end - seg.start);
                speakers.set(seg.speaker, entry);
            }
        }

        const stats: FileStats = {
            file: transcript.file,
            segments: transcript.segments.length,
            words,
            durationSeconds: round(duration, 3),
        };
        const wpm = wordsPerMinute(words, duration);
        if (wpm !== undefined) stats.wpm = wpm;
        perFile.push(stats);

        totalSegments += transcript.segments.length;
        totalWords += words;
        totalSeconds += duration;
    }

    const perSpeaker: SpeakerStats[] = [...speakers.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([speaker, entry]) => {
            const stats: SpeakerStats = {
                speaker,
                segments: entry.segments,
                words: entry.words,
                speakingSeconds: round(entry.seconds, 3),
            };
            const wpm = wordsPerMinute(entry.words, entry.seconds);
            if (wpm !== undefined) stats.wpm = wpm;
            return stats;
        });

    const summary: StatsSummary = {
        totalFiles: perFile.length,
        totalSegments,
        totalWords,
        totalDurationHours: round(totalSeconds / 3600, 3),
    };
    const overallWpm = wordsPerMinute(totalWords, totalSeconds);
    if (overallWpm !== undefined) summary.overallWpm = overallWpm;

    return { summary, perFile, perSpeaker };
}

/**
 * Read every completed JSON transcript in `transcriptsDir`, write the three
 * CSV files into `outDir`. Returns null when there is nothing to summarise.
 */
export async function writeTranscriptStats(
    transcriptsDir: string,
    outDir: string,
    logger: Logger = silentLogger
): Promise<TranscriptStats | null> {
    const transcripts: Array<{ file: string; segments: TranscriptSegment[] }> = [];

    for (const stem of await listCompletedStems(transcriptsDir)) {
        const jsonPath = path.join(transcriptsDir, `${stem}.json`);
        if (!(await fileExists(jsonPath))) continue;
        const stored = await readTranscriptFile(jsonPath);
        transcripts.push({ file: stored.file, segments: stored.result.segments });
    }

    if (transcripts.length === 0) {
        logger.info('No transcripts found.');
        return null;
    }

    const stats = computeStats(transcripts);
    await fs.mkdir(outDir, { recursive: true });

    const { summary } = stats;
    await fs.writeFile(path.join(outDir, STATS_FILES.summary), formatCsv(
        ['total_files', 'total_segments', 'total_words', 'total_duration_hours', 'overall_wpm_est'],
        [{
            total_files: summary.totalFiles,
            total_segments: summary.totalSegments,
            total_words: summary.totalWords,
            total_duration_hours: summary.totalDurationHours,
            overall_wpm_est: summary.overallWpm,
        }]
    ), 'utf-8');

    await fs.writeFile(path.join(outDir, STATS_FILES.perFile), formatCsv(
        ['file', 'segments', 'words', 'duration_s', 'wpm_est'],
        stats.perFile.map(f => ({
            file: f.file,
            segments: f.segments,
            words: f.words,
            duration_s: f.durationSeconds,
            wpm_est: f.wpm,
        }))
    ), 'utf-8');

    await fs.writeFile(path.join(outDir, STATS_FILES.perSpeaker), formatCsv(
        ['speaker', 'segments', 'words', 'speaking_time_s', 'wpm_est'],
        stats.perSpeaker.map(s => ({
            speaker: s.speaker,
            segments: s.segments,
            words: s.words,
            speaking_time_s: s.speakingSeconds,
            wpm_est: s.wpm,
        }))
    ), 'utf-8');

    for (const name of Object.values(STATS_FILES)) {
        logger.info(`Wrote: ${path.join(outDir, name)}`);
    }
    return stats;
}
