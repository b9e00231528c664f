/**
 * Configuration: config.json, merged over defaults, overridden by CLI flags
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../pipeline/errors';
import { OUTPUT_FORMATS } from '../output/types';
import { WHISPER_MODELS } from '../transcription/types';
import { DEFAULT_LEDGER_FILE } from '../pipeline/run-ledger';
import { isNotFound } from '../shared/fs-utils';

// ============ SCHEMA ============

/**
 * True when `target` is `dir` itself or somewhere below it
 */
export function isSameOrInside(dir: string, target: string): boolean {
    const relative = path.relative(path.resolve(dir), path.resolve(target));
    return relative === '' || (relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative));
}

export const DEFAULT_EXTENSIONS = ['.mov', '.mp4', '.m4a', '.wav'];

const StorageSchema = z.object({
    logs: z.string().default('./logs'),
});

const SourceSchema = z.object({
    rcloneRemote: z.string().min(1).optional(),
    remotePath: z.string().min(1).optional(),
    inputDir: z.string().min(1).optional(),
    includeExt: z.array(z.string()).min(1).default(DEFAULT_EXTENSIONS),
    rcloneBinary: z.string().default('rclone'),
    /** Per-copy timeout in minutes (0 = none) */
    copyTimeoutMin: z.number().nonnegative().default(0),
});

const DiskSchema = z.object({
    minFreeGB: z.number().nonnegative().default(5),
    waitIfLow: z.boolean().default(false),
    checkIntervalS: z.number().positive().default(30),
    maxWaitMin: z.number().nonnegative().default(120),
});

const WhisperXSchema = z.object({
    runtime: z.enum(['docker', 'local']).default('docker'),
    image: z.string().optional(),
    binary: z.string().optional(),
    model: z.enum(WHISPER_MODELS).default('medium.en'),
    language: z.string().min(1).optional(),
    device: z.enum(['cpu', 'cuda']).default('cpu'),
    computeType: z.enum(['int8', 'float16', 'float32']).default('int8'),
    diarize: z.boolean().default(true),
    minSpeakers: z.number().int().positive().optional(),
    maxSpeakers: z.number().int().positive().optional(),
    batchSize: z.number().int().positive().optional(),
    /** Engine timeout per file in minutes (0 = none) */
    timeoutMin: z.number().nonnegative().default(180),
    hfTokenEnv: z.string().default('HF_TOKEN'),
    hfTokenFile: z.string().optional(),
});

export const ConfigSchema = z.object({
    storage: StorageSchema.default({}),
    source: SourceSchema.default({}),
    scratchDir: z.string().min(1).default('/tmp/asr_scratch'),
    outputDir: z.string().min(1).default('./transcripts'),
    /** Ledger path; <outputDir>/run_log.csv when absent */
    runLog: z.string().min(1).optional(),
    formats: z.array(z.enum(OUTPUT_FORMATS)).min(1).default([...OUTPUT_FORMATS]),
    /** Files to process per invocation (0 = no limit) */
    maxFiles: z.number().int().nonnegative().default(0),
    force: z.boolean().default(false),
    disk: DiskSchema.default({}),
    whisperx: WhisperXSchema.default({}),
}).superRefine((config, ctx) => {
    const { rcloneRemote, remotePath, inputDir } = config.source;

    if ((rcloneRemote === undefined) !== (remotePath === undefined)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['source'],
            message: 'rcloneRemote and remotePath must be given together',
        });
    }
    if (rcloneRemote === undefined && inputDir === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['source'],
            message: 'a source is required: inputDir, or rcloneRemote with remotePath',
        });
    }
    if (rcloneRemote !== undefined && inputDir !== undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['source'],
            message: 'choose either inputDir or an rclone remote, not both',
        });
    }

    // Scratch leftovers are deleted at startup, so nothing the run keeps may live there
    const kept: Array<[string, string | undefined]> = [
        ['outputDir', config.outputDir],
        ['inputDir', inputDir],
        ['storage.logs', config.storage.logs],
        ['runLog', config.runLog],
    ];
    for (const [name, location] of kept) {
        if (location !== undefined && isSameOrInside(config.scratchDir, location)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scratchDir'], message: `scratchDir must not be or contain ${name}` });
        }
    }

    const { minSpeakers, maxSpeakers } = config.whisperx;
    if (minSpeakers !== undefined && maxSpeakers !== undefined && minSpeakers > maxSpeakers) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['whisperx'], message: 'minSpeakers exceeds maxSpeakers' });
    }
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Values given on the command line; absent keys leave the file value alone
 */
export interface ConfigOverrides {
    rcloneRemote?: string;
    remotePath?: string;
    inputDir?: string;
    scratchDir?: string;
    outputDir?: string;
    includeExt?: string[];
    maxFiles?: number;
    model?: string;
    force?: boolean;
    minFreeGB?: number;
    waitIfLowDisk?: boolean;
    checkIntervalS?: number;
    maxWaitMin?: number;
    runLog?: string;
    formats?: string[];
}

export const CONFIG_FILE = 'config.json';

// ============ LOAD ============

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    return isRecord(value) ? value : {};
}

/**
 * Lay CLI overrides over the raw file content, before validation
 */
export function applyOverrides(raw: Record<string, unknown>, overrides: ConfigOverrides): Record<string, unknown> {
    return {
        ...raw,
        ...definedOnly({
            scratchDir: overrides.scratchDir,
            outputDir: overrides.outputDir,
            runLog: overrides.runLog,
            formats: overrides.formats,
            maxFiles: overrides.maxFiles,
            force: overrides.force,
        }),
        source: {
            ...section(raw, 'source'),
            ...definedOnly({
                rcloneRemote: overrides.rcloneRemote,
                remotePath: overrides.remotePath,
                inputDir: overrides.inputDir,
                includeExt: overrides.includeExt,
            }),
        },
        disk: {
            ...section(raw, 'disk'),
            ...definedOnly({
                minFreeGB: overrides.minFreeGB,
                waitIfLow: overrides.waitIfLowDisk,
                checkIntervalS: overrides.checkIntervalS,
                maxWaitMin: overrides.maxWaitMin,
            }),
        },
        whisperx: {
            ...section(raw, 'whisperx'),
            ...definedOnly({ model: overrides.model }),
        },
    };
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validate raw config content plus overrides; throws ConfigError
 */
export function resolveConfig(raw: unknown, overrides: ConfigOverrides = {}): AppConfig {
    if (!isRecord(raw)) {
        throw new ConfigError('Config must be a JSON object');
    }
    const parsed = ConfigSchema.safeParse(applyOverrides(raw, overrides));
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, { cause: parsed.error });
    }
    return parsed.data;
}

/**
 * Read config.json (defaults when the file does not exist) and apply overrides
 */
export async function loadConfig(configPath?: string, overrides: ConfigOverrides = {}): Promise<AppConfig> {
    const file = path.resolve(configPath ?? CONFIG_FILE);
    let raw: unknown = {};

    try {
        raw = JSON.parse(await fs.readFile(file, 'utf-8'));
    } catch (error) {
        if (!(isNotFound(error) && configPath === undefined)) {
            throw new ConfigError(`Cannot read config ${file}: ${errorMessage(error)}`, { cause: error });
        }
    }

    return resolveConfig(raw, overrides);
}

// ============ PATHS ============

export interface ResolvedPaths {
    logs: string;
    scratchDir: string;
    outputDir: string;
    runLog: string;
    inputDir?: string;
}

/**
 * Absolute paths, relative entries resolved against `cwd`
 */
export function getResolvedPaths(config: AppConfig, cwd: string = process.cwd()): ResolvedPaths {
    const outputDir = path.resolve(cwd, config.outputDir);
    const paths: ResolvedPaths = {
        logs: path.resolve(cwd, config.storage.logs),
        scratchDir: path.resolve(cwd, config.scratchDir),
        outputDir,
        runLog: config.runLog ? path.resolve(cwd, config.runLog) : path.join(outputDir, DEFAULT_LEDGER_FILE),
    };
    if (config.source.inputDir) {
        paths.inputDir = path.resolve(cwd, config.source.inputDir);
    }
    return paths;
}

// ============ SECRETS ============

/**
 * Hugging Face token for diarization: env var first, then token file
 */
export async function readHfToken(config: AppConfig, env: NodeJS.ProcessEnv = process.env): Promise<string | undefined> {
    const fromEnv = env[config.whisperx.hfTokenEnv]?.trim();
    if (fromEnv) return fromEnv;

    const tokenFile = config.whisperx.hfTokenFile;
    if (!tokenFile) return undefined;

    try {
        const token = (await fs.readFile(path.resolve(tokenFile), 'utf-8')).trim();
        return token || undefined;
    } catch (error) {
        throw new ConfigError(`Cannot read Hugging Face token file ${tokenFile}: ${errorMessage(error)}`, { cause: error });
    }
}
