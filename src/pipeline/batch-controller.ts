/**
 * Batch controller
 *
 * Drives one invocation: sweep scratch, list candidates, then for each one
 * skip-or-guard-process-record until the source is exhausted, the file cap
 * is reached, a stop is requested or a fatal error halts the run.
 */

import type { CandidateFile, ProcessResult, RunLimits, RunSummary, StopReason } from './types';
import type { CompletionRegistry } from './completion-registry';
import type { DiskGuard } from './disk-guard';
import type { ScratchLifecycleManager } from './scratch-lifecycle';
import type { RunLedger } from './run-ledger';
import { PipelineErrorCode, ScratchPurgeError, errorMessage, isPipelineError } from './errors';
import type { MediaSource } from '../source/lister';
import type { Logger } from '../shared/logger';
import { silentLogger } from '../shared/logger';

export interface BatchControllerOptions {
    source: MediaSource;
    extensions: readonly string[];
    registry: CompletionRegistry;
    guard: DiskGuard;
    lifecycle: ScratchLifecycleManager;
    ledger: RunLedger;
    limits: RunLimits;
    logger?: Logger;
    now?: () => Date;
}

interface Counters {
    listed: number;
    succeeded: number;
    failed: number;
    skipped: number;
}

export class BatchController {
    private readonly options: BatchControllerOptions;
    private readonly logger: Logger;
    private readonly now: () => Date;
    private readonly abort = new AbortController();

    constructor(options: BatchControllerOptions) {
        this.options = options;
        this.logger = options.logger ?? silentLogger;
        this.now = options.now ?? (() => new Date());
    }

    get stopRequested(): boolean {
        return this.abort.signal.aborted;
    }

    /**
     * Stop before the next file. A file already in flight finishes its
     * lifecycle; a disk-space wait is interrupted.
     */
    requestStop(reason = 'stop requested'): void {
        if (this.stopRequested) return;
        this.logger.warn(`Stopping after the current file (${reason})`);
        this.abort.abort(reason);
    }

    async run(): Promise<RunSummary> {
        const { source, extensions, registry, guard, lifecycle, ledger, limits } = this.options;
        const startedAt = this.now();
        const counters: Counters = { listed: 0, succeeded: 0, failed: 0, skipped: 0 };

        const finish = (stopReason: StopReason, fatal?: RunSummary['fatal']): RunSummary => {
            const summary: RunSummary = {
                runId: ledger.runId,
                startedAt,
                endedAt: this.now(),
                listed: counters.listed,
                processed: counters.succeeded + counters.failed,
                succeeded: counters.succeeded,
                failed: counters.failed,
                skipped: counters.skipped,
                stopReason,
            };
            if (fatal) summary.fatal = fatal;
            this.logSummary(summary);
            return summary;
        };

        this.logger.info(`🚀 Run ${ledger.runId}: ${source.description}`);

        try {
            await lifecycle.sweep();

            for await (const candidate of source.list(extensions)) {
                if (this.stopRequested) return finish('cancelled');
                counters.listed++;

                if (await registry.isComplete(candidate)) {
                    const at = this.now();
                    await ledger.recordAttempt(candidate, 'skipped', { startedAt: at, endedAt: at });
                    counters.skipped++;
                    this.logger.info(`⏭️ Skipping (already done): ${candidate.name}`);
                    continue;
                }

                await guard.ensureFreeSpace(this.abort.signal);
                await this.processOne(candidate, counters);

                if (limits.maxFiles > 0 && counters.succeeded + counters.failed >= limits.maxFiles) {
                    this.logger.info(`Reached max files (${limits.maxFiles})`);
                    return finish('limit');
                }
            }

            return finish(this.stopRequested ? 'cancelled' : 'exhausted');
        } catch (error) {
            if (isPipelineError(error) && error.code === PipelineErrorCode.RUN_CANCELLED) {
                return finish('cancelled');
            }

            // Anything else that escapes a step (fs errors from the registry,
            // ledger or lister included) halts the run with a summary
            const code = isPipelineError(error) ? error.code : PipelineErrorCode.INTERNAL;
            const message = errorMessage(error);
            this.logger.error(`Run halted [${code}]: ${message}`);
            return finish('fatal', { code, message });
        }
    }

    private async processOne(candidate: CandidateFile, counters: Counters): Promise<void> {
        const startedAt = this.now();
        this.logger.info(`📄 Processing: ${candidate.path} (${(candidate.size / 1024 ** 2).toFixed(1)} MB)`);

        let result: ProcessResult;
        try {
            result = await this.options.lifecycle.process(candidate);
        } catch (error) {
            if (error instanceof ScratchPurgeError) {
                // The file's own outcome is recorded before the run halts
                await this.record(candidate, error.attempt ?? {
                    status: 'failure',
                    error,
                    timings: { startedAt, endedAt: this.now() },
                }, counters);
            }
            throw error;
        }

        await this.record(candidate, result, counters);
    }

    private async record(candidate: CandidateFile, result: ProcessResult, counters: Counters): Promise<void> {
        const { ledger } = this.options;
        if (result.status === 'success') {
            counters.succeeded++;
            await ledger.recordAttempt(candidate, 'success', result.timings, { segments: result.segments });
        } else {
            counters.failed++;
            await ledger.recordAttempt(candidate, 'failure', result.timings, { error: result.error });
        }
    }

    private logSummary(summary: RunSummary): void {
        const seconds = Math.round((summary.endedAt.getTime() - summary.startedAt.getTime()) / 1000);
        this.logger.info(
            `📊 Run ${summary.runId} ${summary.stopReason}: ${summary.succeeded} succeeded, ` +
            `${summary.failed} failed, ${summary.skipped} skipped of ${summary.listed} listed (${seconds}s)`
        );
    }
}
