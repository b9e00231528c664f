/**
 * Reader for the JSON transcripts written by the json writer
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { TranscriptResult, TranscriptSegment } from '../pipeline/types';

const StoredSegmentSchema = z.object({
    start: z.number().default(0),
    end: z.number().default(0),
    text: z.string().default(''),
    speaker: z.string().nullish(),
    confidence: z.number().nullish(),
});

const StoredTranscriptSchema = z.object({
    file: z.string().optional(),
    language: z.string().nullish(),
    speakers: z.array(z.string()).nullish(),
    segments: z.array(StoredSegmentSchema).default([]),
});

export interface StoredTranscript {
    /** Source media name, or the JSON file's stem when not recorded */
    file: string;
    result: TranscriptResult;
}

export async function readTranscriptFile(jsonPath: string): Promise<StoredTranscript> {
    const data: unknown = JSON.parse(await fs.readFile(jsonPath, 'utf-8'));
    const parsed = StoredTranscriptSchema.safeParse(data);
    if (!parsed.success) {
        throw new Error(`Not a transcript: ${jsonPath} (${parsed.error.issues[0]?.message ?? 'invalid'})`);
    }

    const segments = parsed.data.segments.map(seg => {
        const segment: TranscriptSegment = { start: seg.start, end: seg.end, text: seg.text };
        if (seg.speaker) segment.speaker = seg.speaker;
        if (typeof seg.confidence === 'number') segment.confidence = seg.confidence;
        return segment;
    });

    const result: TranscriptResult = { segments };
    if (parsed.data.language) result.language = parsed.data.language;
    if (parsed.data.speakers) result.speakers = parsed.data.speakers;

    return {
        file: parsed.data.file ?? path.basename(jsonPath, path.extname(jsonPath)),
        result,
    };
}
