#!/usr/bin/env node
/**
 * Command line entry point
 *
 *   transcribe   run the batch over a local folder or rclone remote
 *   export-csv   backfill <stem>.csv from completed JSON transcripts
 *   stats        descriptive stats over completed transcripts
 *   status       read-only HTTP view of an output directory
 */

import * as path from 'path';
import { parseArgs } from 'util';
import {
    getResolvedPaths,
    loadConfig,
    type ConfigOverrides,
} from './config/config';
import { ConfigError, errorMessage, isPipelineError } from './pipeline/errors';
import type { RunSummary } from './pipeline/types';
import { DEFAULT_LEDGER_FILE } from './pipeline/run-ledger';
import { createBatchController } from './transcribe';
import type { BatchController } from './pipeline/batch-controller';
import { exportCsv } from './analysis/export-csv';
import { writeTranscriptStats } from './analysis/stats';
import { DEFAULT_STATUS_PORT, createStatusApp, startStatusApi } from './status/status-api';
import { FileLogger } from './shared/logger';

export const EXIT_OK = 0;
export const EXIT_CONFIG_INVALID = 2;
export const EXIT_FATAL = 3;
export const EXIT_SIGNAL = 130;

const USAGE = `Usage: classroom-transcripts <command> [options]

Commands:
  transcribe   --input-dir <dir> | --rclone-remote <name> --remote-path <path>
               [--output-dir <dir>] [--scratch-dir <dir>] [--config <file>]
               [--include-ext .mp4,.m4a] [--max-files N] [--model NAME] [--force]
               [--min-free-gb N] [--wait-if-low-disk] [--check-interval-s N]
               [--max-wait-min N] [--run-log <file>] [--formats json,srt,vtt,txt,csv]
  export-csv   --output-dir <dir> [--force]
  stats        --transcripts-dir <dir> --out-dir <dir>
  status       [--output-dir <dir>] [--run-log <file>] [--port ${DEFAULT_STATUS_PORT}]
`;

function parseNumber(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new ConfigError(`--${flag} expects a number, got "${value}"`);
    }
    return parsed;
}

function parseList(value: string | undefined): string[] | undefined {
    if (value === undefined) return undefined;
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * parseArgs rejects unknown flags with a TypeError; report those as config errors
 */
function parseFlags<T>(parse: () => T): T {
    try {
        return parse();
    } catch (error) {
        if (isPipelineError(error)) throw error;
        throw new ConfigError(errorMessage(error), { cause: error });
    }
}

export function exitCodeFor(summary: RunSummary): number {
    switch (summary.stopReason) {
        case 'fatal':
            return EXIT_FATAL;
        case 'cancelled':
            return EXIT_SIGNAL;
        default:
            return EXIT_OK;
    }
}

// ============ COMMANDS ============

async function transcribeCommand(args: string[]): Promise<number> {
    const { values } = parseFlags(() => parseArgs({
        args,
        options: {
            config: { type: 'string' },
            'rclone-remote': { type: 'string' },
            'remote-path': { type: 'string' },
            'input-dir': { type: 'string' },
            'scratch-dir': { type: 'string' },
            'output-dir': { type: 'string' },
            'include-ext': { type: 'string' },
            'max-files': { type: 'string' },
            model: { type: 'string' },
            force: { type: 'boolean' },
            'min-free-gb': { type: 'string' },
            'wait-if-low-disk': { type: 'boolean' },
            'check-interval-s': { type: 'string' },
            'max-wait-min': { type: 'string' },
            'run-log': { type: 'string' },
            formats: { type: 'string' },
        },
    }));

    const overrides: ConfigOverrides = {
        rcloneRemote: values['rclone-remote'],
        remotePath: values['remote-path'],
        inputDir: values['input-dir'],
        scratchDir: values['scratch-dir'],
        outputDir: values['output-dir'],
        includeExt: parseList(values['include-ext']),
        maxFiles: parseNumber('max-files', values['max-files']),
        model: values.model,
        force: values.force,
        minFreeGB: parseNumber('min-free-gb', values['min-free-gb']),
        waitIfLowDisk: values['wait-if-low-disk'],
        checkIntervalS: parseNumber('check-interval-s', values['check-interval-s']),
        maxWaitMin: parseNumber('max-wait-min', values['max-wait-min']),
        runLog: values['run-log'],
        formats: parseList(values.formats),
    };

    const config = await loadConfig(values.config, overrides);
    const paths = getResolvedPaths(config);
    const logger = new FileLogger(paths.logs);

    let controller: BatchController | null = null;

    // First signal: finish the current file. Second: leave now.
    let signals = 0;
    const onSignal = (signal: NodeJS.Signals): void => {
        signals++;
        if (signals === 1 && controller) {
            controller.requestStop(signal);
            return;
        }
        logger.warn(`${signal} received, exiting now. Scratch may still hold the current file.`);
        process.exit(EXIT_SIGNAL);
    };

    try {
        controller = await createBatchController(config, { logger });
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);

        logger.info(`📁 Output: ${paths.outputDir}`);
        logger.info(`🗂️ Scratch: ${paths.scratchDir}`);
        const summary = await controller.run();
        if (summary.fatal) {
            logger.error(`Fatal: ${summary.fatal.message}`);
        }
        return exitCodeFor(summary);
    } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        await logger.close();
    }
}

async function exportCsvCommand(args: string[]): Promise<number> {
    const { values } = parseFlags(() => parseArgs({
        args,
        options: {
            'output-dir': { type: 'string' },
            force: { type: 'boolean' },
        },
    }));
    const outputDir = values['output-dir'];
    if (!outputDir) throw new ConfigError('--output-dir is required');

    const summary = await exportCsv(path.resolve(outputDir), {
        force: values.force ?? false,
        logger: consoleLogger(),
    });
    return summary.errors > 0 ? EXIT_FATAL : EXIT_OK;
}

async function statsCommand(args: string[]): Promise<number> {
    const { values } = parseFlags(() => parseArgs({
        args,
        options: {
            'transcripts-dir': { type: 'string' },
            'out-dir': { type: 'string' },
        },
    }));
    const transcriptsDir = values['transcripts-dir'];
    const outDir = values['out-dir'];
    if (!transcriptsDir || !outDir) throw new ConfigError('--transcripts-dir and --out-dir are required');

    await writeTranscriptStats(path.resolve(transcriptsDir), path.resolve(outDir), consoleLogger());
    return EXIT_OK;
}

async function statusCommand(args: string[]): Promise<number> {
    const { values } = parseFlags(() => parseArgs({
        args,
        options: {
            'output-dir': { type: 'string' },
            'run-log': { type: 'string' },
            port: { type: 'string' },
        },
    }));
    const outputDir = path.resolve(values['output-dir'] ?? './transcripts');
    const runLog = values['run-log'] ? path.resolve(values['run-log']) : path.join(outputDir, DEFAULT_LEDGER_FILE);
    const port = parseNumber('port', values.port) ?? DEFAULT_STATUS_PORT;

    const server = await startStatusApi(createStatusApp({ outputDir, runLog }), port);
    console.log(`📊 Status API listening on http://localhost:${port}`);

    await new Promise<void>((resolve, reject) => {
        const shutdown = (): void => {
            server.close((error) => (error ? reject(error) : resolve()));
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    });
    return EXIT_OK;
}

function consoleLogger(): FileLogger {
    return new FileLogger('', 'cli', { write: () => undefined });
}

// ============ MAIN ============

const COMMANDS: Record<string, (args: string[]) => Promise<number>> = {
    transcribe: transcribeCommand,
    'export-csv': exportCsvCommand,
    stats: statsCommand,
    status: statusCommand,
};

export async function main(argv: string[]): Promise<number> {
    const [command, ...rest] = argv;
    const run = command !== undefined && Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;

    if (!run) {
        console.error(USAGE);
        return command === undefined || command === '--help' ? EXIT_OK : EXIT_CONFIG_INVALID;
    }

    try {
        return await run(rest);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`❌ ${error.message}`);
            return EXIT_CONFIG_INVALID;
        }
        console.error(`❌ ${errorMessage(error)}`);
        return EXIT_FATAL;
    }
}

if (require.main === module) {
    void main(process.argv.slice(2)).then((code) => {
        process.exitCode = code;
    });
}
