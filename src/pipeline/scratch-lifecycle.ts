/**
 * Scratch lifecycle manager
 *
 * Owns the single local copy of one candidate at a time:
 * fetch -> transcribe -> write outputs -> mark complete -> purge.
 * The purge runs on every exit path once a fetch has started.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { AttemptTimings, CandidateFile, ProcessResult, TranscriptResult } from './types';
import type { CompletionRegistry } from './completion-registry';
import {
    FetchError,
    ScratchPurgeError,
    TranscriptionError,
    WriteError,
    errorMessage,
    toPipelineError,
} from './errors';
import type { MediaSource } from '../source/lister';
import type { Transcriber, TranscriptionOptions } from '../transcription/types';
import type { OutputWriter } from '../output/types';
import type { Logger } from '../shared/logger';
import { silentLogger } from '../shared/logger';

/** Staging directory for artifacts of the file in flight, under the output directory */
export const PARTIAL_DIR = '.partial';

/**
 * The local copy of one candidate. At most one exists at any instant.
 */
export interface ScratchCopy {
    readonly candidate: CandidateFile;
    readonly path: string;
}

export interface ScratchLifecycleOptions {
    scratchDir: string;
    outputDir: string;
    source: MediaSource;
    transcriber: Transcriber;
    transcription: TranscriptionOptions;
    writers: readonly OutputWriter[];
    registry: CompletionRegistry;
    logger?: Logger;
    now?: () => Date;
}

function elapsedMs(from: Date, to: Date): number {
    return to.getTime() - from.getTime();
}

export class ScratchLifecycleManager {
    private readonly options: ScratchLifecycleOptions;
    private readonly logger: Logger;
    private readonly now: () => Date;
    private resident: ScratchCopy | null = null;

    constructor(options: ScratchLifecycleOptions) {
        this.options = options;
        this.logger = options.logger ?? silentLogger;
        this.now = options.now ?? (() => new Date());
    }

    /** The copy currently on local disk, if any */
    get residentCopy(): ScratchCopy | null {
        return this.resident;
    }

    get stagingDir(): string {
        return path.join(this.options.outputDir, PARTIAL_DIR);
    }

    /**
     * Remove the media copies a previous, interrupted run left in scratch
     * (regular files at the top level only) and the staging directory.
     * Returns the names removed from scratch.
     */
    async sweep(): Promise<string[]> {
        if (this.resident) {
            throw new Error(`Cannot sweep scratch while ${this.resident.path} is in use`);
        }

        await fs.mkdir(this.options.scratchDir, { recursive: true });
        const entries = await fs.readdir(this.options.scratchDir, { withFileTypes: true });
        const leftovers: string[] = [];

        for (const entry of entries) {
            const leftover = path.join(this.options.scratchDir, entry.name);
            if (!entry.isFile()) {
                this.logger.warn(`Leaving non-file entry in scratch: ${leftover}`);
                continue;
            }
            this.logger.warn(`Removing leftover scratch file: ${leftover}`);
            try {
                await fs.rm(leftover, { force: true });
                leftovers.push(entry.name);
            } catch (error) {
                throw new ScratchPurgeError(`Cannot remove leftover scratch file ${leftover}: ${errorMessage(error)}`, {
                    cause: error,
                    context: { operation: 'sweep' },
                });
            }
        }

        await fs.rm(this.stagingDir, { recursive: true, force: true });
        return leftovers;
    }

    /**
     * Run one candidate through its whole lifecycle. Per-file failures come
     * back as a failure result; only ScratchPurgeError is thrown.
     */
    async process(candidate: CandidateFile): Promise<ProcessResult> {
        const timings: AttemptTimings = { startedAt: this.now(), endedAt: this.now() };
        const copy = this.acquire(candidate);
        let result: ProcessResult;

        try {
            await this.fetch(copy, timings);
            const transcript = await this.transcribe(copy, timings);
            await this.persist(candidate, transcript, timings);
            timings.endedAt = this.now();
            result = { status: 'success', segments: transcript.segments.length, timings };
        } catch (error) {
            timings.endedAt = this.now();
            result = {
                status: 'failure',
                error: toPipelineError(error, (message, init) => new TranscriptionError(message, {
                    ...init,
                    context: { file: candidate.path },
                })),
                timings,
            };
        }

        await this.purge(copy, result);

        if (result.status === 'failure') {
            this.logger.error(`Failed: ${candidate.name} [${result.error.code}] ${result.error.message}`);
        } else {
            this.logger.info(`✅ Done: ${candidate.name} (${result.segments} segments)`);
        }
        return result;
    }

    private acquire(candidate: CandidateFile): ScratchCopy {
        if (this.resident) {
            throw new Error(`Scratch copy already resident: ${this.resident.path}`);
        }
        const copy: ScratchCopy = Object.freeze({
            candidate,
            path: path.join(this.options.scratchDir, candidate.name),
        });
        this.resident = copy;
        return copy;
    }

    private async fetch(copy: ScratchCopy, timings: AttemptTimings): Promise<void> {
        this.logger.info(`⬇️ Fetching: ${copy.candidate.path}`);
        const started = this.now();
        try {
            await fs.mkdir(this.options.scratchDir, { recursive: true });
            await this.options.source.fetch(copy.candidate, copy.path);
        } catch (error) {
            throw toPipelineError(error, (message, init) => new FetchError(message, {
                ...init,
                context: { file: copy.candidate.path, operation: 'fetch' },
            }));
        } finally {
            timings.fetchMs = elapsedMs(started, this.now());
        }
    }

    private async transcribe(copy: ScratchCopy, timings: AttemptTimings): Promise<TranscriptResult> {
        const stats = await fs.stat(copy.path);
        if (stats.size === 0) {
            throw new TranscriptionError(`Empty media file: ${copy.candidate.name}`, {
                context: { file: copy.candidate.path, operation: 'transcribe' },
            });
        }

        this.logger.info(`🎧 Transcribing: ${copy.candidate.name}...`);
        const started = this.now();
        try {
            return await this.options.transcriber.transcribe(copy.path, this.options.transcription);
        } finally {
            timings.transcribeMs = elapsedMs(started, this.now());
        }
    }

    /**
     * Stage every artifact, move them into place, then write the marker
     */
    private async persist(candidate: CandidateFile, result: TranscriptResult, timings: AttemptTimings): Promise<void> {
        const started = this.now();
        const { outputDir, writers, registry } = this.options;
        const stagedStem = path.join(this.stagingDir, candidate.stem);

        try {
            await fs.mkdir(this.stagingDir, { recursive: true });
            for (const writer of writers) {
                await writer.write(result, stagedStem, candidate.name);
            }
            for (const writer of writers) {
                await fs.rename(
                    `${stagedStem}${writer.extension}`,
                    path.join(outputDir, `${candidate.stem}${writer.extension}`)
                );
            }
        } catch (error) {
            await this.discardStaged(candidate);
            throw new WriteError(`Writing outputs for ${candidate.name} failed: ${errorMessage(error)}`, {
                cause: error,
                context: { file: candidate.path, operation: 'write' },
            });
        }

        try {
            await registry.markComplete(candidate);
        } catch (error) {
            throw new WriteError(`Completion marker for ${candidate.name} failed: ${errorMessage(error)}`, {
                cause: error,
                context: { file: candidate.path, operation: 'mark' },
            });
        } finally {
            timings.writeMs = elapsedMs(started, this.now());
        }
    }

    private async discardStaged(candidate: CandidateFile): Promise<void> {
        for (const writer of this.options.writers) {
            const staged = path.join(this.stagingDir, `${candidate.stem}${writer.extension}`);
            try {
                await fs.rm(staged, { force: true });
            } catch (error) {
                this.logger.warn(`Could not remove staged file ${staged}: ${errorMessage(error)}`);
            }
        }
    }

    private async purge(copy: ScratchCopy, attempt: ProcessResult): Promise<void> {
        try {
            await fs.rm(copy.path, { force: true });
        } catch (error) {
            throw new ScratchPurgeError(`Cannot purge scratch copy ${copy.path}: ${errorMessage(error)}`, {
                cause: error,
                context: { file: copy.candidate.path, operation: 'purge' },
            }, attempt);
        }
        this.resident = null;
        this.logger.info(`🧹 Purged: ${copy.path}`);
    }
}
