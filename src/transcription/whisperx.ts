/**
 * WhisperX transcriber
 *
 * Runs WhisperX in Docker (ghcr.io/jim60105/whisperx:no_model) or as a local
 * binary, with JSON output into a throwaway directory, and reads the result back.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import type { TranscriptResult, TranscriptSegment } from '../pipeline/types';
import { TranscriptionError, errorMessage } from '../pipeline/errors';
import { runCommand, type CommandRunner } from '../shared/run-command';
import type { Transcriber, TranscriptionOptions } from './types';

export const WHISPERX_DOCKER_IMAGE = 'ghcr.io/jim60105/whisperx:no_model';

export type WhisperXRuntime = 'docker' | 'local';

export interface WhisperXOptions {
    runtime: WhisperXRuntime;
    /** Docker image (docker runtime) */
    image?: string;
    /** whisperx executable (local runtime) */
    binary?: string;
    /** Kill the engine after this many milliseconds (0 = no limit) */
    timeoutMs?: number;
    /** Parent of the per-call output directory (default: OS temp dir) */
    workDir?: string;
    runner?: CommandRunner;
}

const WordSchema = z.object({
    score: z.number().optional(),
}).passthrough();

const SegmentSchema = z.object({
    start: z.number(),
    end: z.number(),
    text: z.string(),
    speaker: z.string().optional(),
    words: z.array(WordSchema).optional(),
}).passthrough();

const WhisperXOutputSchema = z.object({
    segments: z.array(SegmentSchema),
    language: z.string().optional(),
}).passthrough();

type WhisperXOutput = z.infer<typeof WhisperXOutputSchema>;

/**
 * Engine flags shared by both runtimes
 */
export function buildEngineArgs(options: TranscriptionOptions, outputDir: string): string[] {
    const args = [
        '--model', options.model,
        '--device', options.device,
        '--compute_type', options.computeType,
        '--output_format', 'json',
        '--output_dir', outputDir,
    ];

    if (options.language) {
        args.push('--language', options.language);
    }
    if (options.diarize) {
        args.push('--diarize');
        if (options.hfToken) args.push('--hf_token', options.hfToken);
        if (options.minSpeakers !== undefined) args.push('--min_speakers', String(options.minSpeakers));
        if (options.maxSpeakers !== undefined) args.push('--max_speakers', String(options.maxSpeakers));
    }
    if (options.batchSize !== undefined) {
        args.push('--batch_size', String(options.batchSize));
    }

    return args;
}

function meanScore(words: WhisperXOutput['segments'][number]['words']): number | undefined {
    const scores = (words ?? [])
        .map(word => word.score)
        .filter((score): score is number => score !== undefined);
    if (scores.length === 0) return undefined;
    return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

/**
 * WhisperX JSON -> TranscriptResult
 */
export function parseWhisperXOutput(raw: unknown): TranscriptResult {
    const parsed = WhisperXOutputSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Malformed WhisperX output: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
    }

    const segments: TranscriptSegment[] = parsed.data.segments.map(seg => {
        const segment: TranscriptSegment = { start: seg.start, end: seg.end, text: seg.text.trim() };
        if (seg.speaker) segment.speaker = seg.speaker;
        const confidence = meanScore(seg.words);
        if (confidence !== undefined) segment.confidence = confidence;
        return segment;
    });

    const speakers = [...new Set(segments.flatMap(seg => (seg.speaker ? [seg.speaker] : [])))];

    const result: TranscriptResult = { segments };
    if (parsed.data.language) result.language = parsed.data.language;
    if (speakers.length > 0) result.speakers = speakers;
    return result;
}

export class WhisperXTranscriber implements Transcriber {
    private readonly options: WhisperXOptions;
    private readonly run: CommandRunner;

    constructor(options: WhisperXOptions) {
        this.options = options;
        this.run = options.runner ?? runCommand;
    }

    async transcribe(localPath: string, options: TranscriptionOptions): Promise<TranscriptResult> {
        const outputDir = await fs.mkdtemp(path.join(this.options.workDir ?? os.tmpdir(), 'whisperx-'));

        try {
            const [command, args] = this.command(localPath, outputDir, options);

            try {
                await this.run(command, args, { timeoutMs: this.options.timeoutMs ?? 0 });
            } catch (error) {
                throw new TranscriptionError(`WhisperX failed: ${errorMessage(error)}`, {
                    cause: error,
                    context: { file: localPath, operation: 'transcribe' },
                });
            }

            const stem = path.basename(localPath, path.extname(localPath));
            const jsonPath = path.join(outputDir, `${stem}.json`);

            try {
                const data = await fs.readFile(jsonPath, 'utf-8');
                return parseWhisperXOutput(JSON.parse(data));
            } catch (error) {
                throw new TranscriptionError(`Failed to read WhisperX output ${jsonPath}: ${errorMessage(error)}`, {
                    cause: error,
                    context: { file: localPath, operation: 'transcribe' },
                });
            }
        } finally {
            await fs.rm(outputDir, { recursive: true, force: true });
        }
    }

    private command(localPath: string, outputDir: string, options: TranscriptionOptions): [string, string[]] {
        if (this.options.runtime === 'local') {
            return [
                this.options.binary ?? 'whisperx',
                [localPath, ...buildEngineArgs(options, outputDir)],
            ];
        }

        // Docker: mount the scratch dir read-only and the output dir
        const audioDir = path.dirname(path.resolve(localPath));
        return ['docker', [
            'run', '--rm',
            ...(options.device === 'cuda' ? ['--gpus', 'all'] : []),
            '-v', `${audioDir}:/audio:ro`,
            '-v', `${outputDir}:/output`,
            this.options.image ?? WHISPERX_DOCKER_IMAGE,
            '--',
            `/audio/${path.basename(localPath)}`,
            ...buildEngineArgs(options, '/output'),
        ]];
    }
}
