/**
 * rclone remote adapter
 *
 * Lists with `rclone lsjson` and transfers one file at a time with `rclone copyto`.
 */

import { z } from 'zod';
import type { RemoteAdapter, RemoteEntry } from './lister';
import { runCommand, type CommandRunner } from '../shared/run-command';

const LsJsonItemSchema = z.object({
    Path: z.string().optional(),
    Name: z.string(),
    Size: z.number().default(0),
    ModTime: z.string().default(''),
    IsDir: z.boolean().default(false),
});

const LsJsonSchema = z.array(LsJsonItemSchema);

export interface RcloneOptions {
    /** Remote name as configured in rclone.conf (without the colon) */
    remote: string;
    /** rclone binary (default: rclone on PATH) */
    binary?: string;
    /** Timeout per copy in milliseconds (0 = none) */
    copyTimeoutMs?: number;
    runner?: CommandRunner;
}

export class RcloneAdapter implements RemoteAdapter {
    private readonly remote: string;
    private readonly binary: string;
    private readonly copyTimeoutMs: number;
    private readonly run: CommandRunner;

    constructor(options: RcloneOptions) {
        this.remote = options.remote;
        this.binary = options.binary ?? 'rclone';
        this.copyTimeoutMs = options.copyTimeoutMs ?? 0;
        this.run = options.runner ?? runCommand;
    }

    describe(remotePath: string): string {
        return `${this.remote}:${remotePath}`;
    }

    async list(remotePath: string): Promise<RemoteEntry[]> {
        const { stdout } = await this.run(this.binary, [
            'lsjson', this.describe(remotePath), '--files-only', '--recursive',
        ]);

        const parsed = LsJsonSchema.safeParse(JSON.parse(stdout));
        if (!parsed.success) {
            throw new Error(`Unexpected rclone lsjson output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
        }

        return parsed.data
            .filter(item => !item.IsDir)
            .map(item => ({
                path: item.Path ?? item.Name,
                size: item.Size,
                modifiedAt: item.ModTime ? new Date(item.ModTime) : new Date(0),
            }));
    }

    async copyToLocal(remotePath: string, localPath: string): Promise<void> {
        await this.run(this.binary, [
            'copyto', this.describe(remotePath), localPath,
            '--transfers', '1',
            '--checkers', '1',
            '--retries', '3',
            '--low-level-retries', '10',
        ], { timeoutMs: this.copyTimeoutMs });
    }
}
