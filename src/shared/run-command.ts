/**
 * Child process helper shared by the rclone adapter and the WhisperX transcriber
 */

import { execFile } from 'child_process';

export interface CommandOptions {
    /** Kill the process after this many milliseconds (0 = no limit) */
    timeoutMs?: number;
    env?: NodeJS.ProcessEnv;
}

export interface CommandOutput {
    stdout: string;
    stderr: string;
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandOutput>;

export class CommandFailedError extends Error {
    constructor(
        message: string,
        readonly exitCode: number | null,
        readonly stderr: string,
        readonly timedOut: boolean
    ) {
        super(message);
        this.name = 'CommandFailedError';
    }
}

const MAX_BUFFER = 50 * 1024 * 1024;

/**
 * Run a command without a shell; resolves with its output, rejects with
 * CommandFailedError on non-zero exit, spawn failure or timeout.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
    return new Promise((resolve, reject) => {
        execFile(
            command,
            args,
            {
                maxBuffer: MAX_BUFFER,
                timeout: options.timeoutMs ?? 0,
                env: options.env ?? process.env,
                encoding: 'utf8',
            },
            (error, stdout, stderr) => {
                if (!error) {
                    resolve({ stdout, stderr });
                    return;
                }

                const timedOut = error.killed === true && error.signal === 'SIGTERM' && (options.timeoutMs ?? 0) > 0;
                const exitCode = typeof error.code === 'number' ? error.code : null;
                const detail = stderr.trim().split('\n').slice(-5).join('\n');
                const reason = timedOut
                    ? `timed out after ${Math.round((options.timeoutMs ?? 0) / 1000)}s`
                    : exitCode !== null
                        ? `exited with code ${exitCode}`
                        : error.message;

                reject(new CommandFailedError(
                    `${command} ${reason}${detail ? `: ${detail}` : ''}`,
                    exitCode,
                    stderr,
                    timedOut
                ));
            }
        );
    });
};
