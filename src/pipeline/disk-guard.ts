/**
 * Disk guard
 *
 * Samples free space on the scratch volume before every fetch. Below the
 * minimum it either waits for space to come back (polling on a fixed
 * interval, up to a maximum wait) or aborts the run straight away.
 */

import * as fs from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import { DiskExhaustedError, RunCancelledError } from './errors';
import type { Logger } from '../shared/logger';
import { silentLogger } from '../shared/logger';

export const BYTES_PER_GB = 1024 ** 3;

export type DiskGuardPolicy = 'wait' | 'fail-fast';
export type GuardDecision = 'allowed' | 'wait' | 'abort';

/** Free bytes available to this process on the volume holding `dir` */
export type FreeSpaceProbe = (dir: string) => Promise<number>;

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface DiskGuardOptions {
    scratchDir: string;
    minFreeGB: number;
    policy: DiskGuardPolicy;
    checkIntervalMs: number;
    maxWaitMs: number;
    probe?: FreeSpaceProbe;
    sleep?: Sleeper;
    logger?: Logger;
}

export const statfsFreeBytes: FreeSpaceProbe = async (dir) => {
    const stats = await fs.statfs(dir);
    return stats.bavail * stats.bsize;
};

const defaultSleep: Sleeper = async (ms, signal) => {
    await delay(ms, undefined, { signal });
};

function formatGB(bytes: number): string {
    return (bytes / BYTES_PER_GB).toFixed(2);
}

export class DiskGuard {
    private readonly options: DiskGuardOptions;
    private readonly probe: FreeSpaceProbe;
    private readonly sleep: Sleeper;
    private readonly logger: Logger;

    constructor(options: DiskGuardOptions) {
        this.options = options;
        this.probe = options.probe ?? statfsFreeBytes;
        this.sleep = options.sleep ?? defaultSleep;
        this.logger = options.logger ?? silentLogger;
    }

    get minFreeBytes(): number {
        return this.options.minFreeGB * BYTES_PER_GB;
    }

    sample(): Promise<number> {
        return this.probe(this.options.scratchDir);
    }

    /**
     * One sample, one decision
     */
    async check(): Promise<GuardDecision> {
        const free = await this.sample();
        if (free >= this.minFreeBytes) return 'allowed';
        return this.options.policy === 'wait' ? 'wait' : 'abort';
    }

    /**
     * Resolve once free space is at or above the minimum.
     * Throws DiskExhaustedError under fail-fast or when the wait runs out,
     * RunCancelledError when `signal` fires during a wait.
     */
    async ensureFreeSpace(signal?: AbortSignal): Promise<void> {
        const { policy, checkIntervalMs, maxWaitMs, minFreeGB } = this.options;
        let waitedMs = 0;

        for (;;) {
            const free = await this.sample();
            if (free >= this.minFreeBytes) {
                if (waitedMs > 0) {
                    this.logger.info(`💾 Disk space recovered: ${formatGB(free)} GB free after ${Math.round(waitedMs / 1000)}s`);
                }
                return;
            }

            const status = `${formatGB(free)} GB free, ${minFreeGB} GB required`;

            if (policy === 'fail-fast') {
                throw new DiskExhaustedError(`Insufficient disk space on scratch volume: ${status}`, {
                    context: { operation: 'disk-guard', metadata: { freeBytes: free } },
                });
            }

            if (waitedMs >= maxWaitMs) {
                throw new DiskExhaustedError(`Insufficient disk space after waiting ${Math.round(maxWaitMs / 60000)} min: ${status}`, {
                    context: { operation: 'disk-guard', metadata: { freeBytes: free, waitedMs } },
                });
            }

            if (signal?.aborted) {
                throw new RunCancelledError('Stop requested while waiting for disk space');
            }

            this.logger.warn(`Low disk space (${status}). Waiting ${Math.round(checkIntervalMs / 1000)}s...`);

            try {
                await this.sleep(checkIntervalMs, signal);
            } catch (error) {
                if (signal?.aborted) {
                    throw new RunCancelledError('Stop requested while waiting for disk space', { cause: error });
                }
                throw error;
            }
            waitedMs += checkIntervalMs;
        }
    }
}
