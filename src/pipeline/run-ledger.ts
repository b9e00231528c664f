/**
 * Run ledger
 *
 * Append-only CSV with one row per attempted file per invocation.
 * The header is written once, when the file is created; each row is a
 * single append.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { AttemptOutcome, AttemptTimings, CandidateFile, RunLedgerEntry } from './types';
import type { PipelineError } from './errors';
import { formatCsvRow, parseCSV, type CsvValue } from '../shared/csv';
import { hasErrorCode, isNotFound } from '../shared/fs-utils';

export const DEFAULT_LEDGER_FILE = 'run_log.csv';

export const LEDGER_COLUMNS = [
    'run_id',
    'filename',
    'source_path',
    'size_bytes',
    'modified_at',
    'outcome',
    'started_at',
    'ended_at',
    'wall_time_s',
    'fetch_s',
    'transcribe_s',
    'write_s',
    'segments',
    'model',
    'device',
    'compute_type',
    'diarize',
    'error_code',
    'error',
] as const;

/**
 * Settings shared by every row of one invocation
 */
export interface LedgerRunInfo {
    runId: string;
    model: string;
    device: string;
    computeType: string;
    diarize: boolean;
}

export interface AttemptDetails {
    segments?: number;
    error?: PipelineError;
}

/** ms -> seconds, millisecond precision */
function toSeconds(ms: number | undefined): number | undefined {
    return ms === undefined ? undefined : Math.round(ms) / 1000;
}

function toRow(entry: RunLedgerEntry): CsvValue[] {
    return [
        entry.runId,
        entry.filename,
        entry.sourcePath,
        entry.sizeBytes,
        entry.modifiedAt,
        entry.outcome,
        entry.startedAt,
        entry.endedAt,
        entry.wallTimeSeconds,
        entry.fetchSeconds,
        entry.transcribeSeconds,
        entry.writeSeconds,
        entry.segments,
        entry.model,
        entry.device,
        entry.computeType,
        entry.diarize,
        entry.errorCode,
        entry.error,
    ];
}

function optionalNumber(value: string | undefined): number | undefined {
    if (value === undefined || value === '') return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
}

function optionalString(value: string | undefined): string | undefined {
    return value === undefined || value === '' ? undefined : value;
}

function toOutcome(value: string | undefined): AttemptOutcome {
    if (value === 'success' || value === 'failure' || value === 'skipped') return value;
    throw new Error(`Unknown ledger outcome: ${value ?? '(missing)'}`);
}

function fromRecord(record: Record<string, string>): RunLedgerEntry {
    const entry: RunLedgerEntry = {
        runId: record.run_id ?? '',
        filename: record.filename ?? '',
        sourcePath: record.source_path ?? '',
        sizeBytes: optionalNumber(record.size_bytes) ?? 0,
        modifiedAt: record.modified_at ?? '',
        outcome: toOutcome(record.outcome),
        startedAt: record.started_at ?? '',
        endedAt: record.ended_at ?? '',
        wallTimeSeconds: optionalNumber(record.wall_time_s) ?? 0,
        model: record.model ?? '',
        device: record.device ?? '',
        computeType: record.compute_type ?? '',
        diarize: record.diarize === 'true',
    };

    const fetchSeconds = optionalNumber(record.fetch_s);
    if (fetchSeconds !== undefined) entry.fetchSeconds = fetchSeconds;
    const transcribeSeconds = optionalNumber(record.transcribe_s);
    if (transcribeSeconds !== undefined) entry.transcribeSeconds = transcribeSeconds;
    const writeSeconds = optionalNumber(record.write_s);
    if (writeSeconds !== undefined) entry.writeSeconds = writeSeconds;
    const segments = optionalNumber(record.segments);
    if (segments !== undefined) entry.segments = segments;
    const errorCode = optionalString(record.error_code);
    if (errorCode !== undefined) entry.errorCode = errorCode;
    const error = optionalString(record.error);
    if (error !== undefined) entry.error = error;

    return entry;
}

/**
 * Parse a ledger file; a missing file is an empty ledger
 */
export async function readLedger(filePath: string): Promise<RunLedgerEntry[]> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        if (isNotFound(error)) return [];
        throw error;
    }
    return parseCSV(content).map(fromRecord);
}

export class RunLedger {
    private headerReady = false;

    constructor(
        readonly filePath: string,
        private readonly info: LedgerRunInfo
    ) {}

    get runId(): string {
        return this.info.runId;
    }

    /**
     * Append one row for `candidate` and return the entry written
     */
    async recordAttempt(
        candidate: CandidateFile,
        outcome: AttemptOutcome,
        timings: AttemptTimings,
        details: AttemptDetails = {}
    ): Promise<RunLedgerEntry> {
        const entry: RunLedgerEntry = {
            runId: this.info.runId,
            filename: candidate.name,
            sourcePath: candidate.path,
            sizeBytes: candidate.size,
            modifiedAt: candidate.modifiedAt.toISOString(),
            outcome,
            startedAt: timings.startedAt.toISOString(),
            endedAt: timings.endedAt.toISOString(),
            wallTimeSeconds: (timings.endedAt.getTime() - timings.startedAt.getTime()) / 1000,
            model: this.info.model,
            device: this.info.device,
            computeType: this.info.computeType,
            diarize: this.info.diarize,
        };

        const fetchSeconds = toSeconds(timings.fetchMs);
        if (fetchSeconds !== undefined) entry.fetchSeconds = fetchSeconds;
        const transcribeSeconds = toSeconds(timings.transcribeMs);
        if (transcribeSeconds !== undefined) entry.transcribeSeconds = transcribeSeconds;
        const writeSeconds = toSeconds(timings.writeMs);
        if (writeSeconds !== undefined) entry.writeSeconds = writeSeconds;
        if (details.segments !== undefined) entry.segments = details.segments;
        if (details.error) {
            entry.errorCode = details.error.code;
            entry.error = details.error.message;
        }

        await this.ensureHeader();
        await fs.appendFile(this.filePath, formatCsvRow(toRow(entry)), 'utf-8');
        return entry;
    }

    readEntries(): Promise<RunLedgerEntry[]> {
        return readLedger(this.filePath);
    }

    private async ensureHeader(): Promise<void> {
        if (this.headerReady) return;
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        try {
            await fs.writeFile(this.filePath, formatCsvRow([...LEDGER_COLUMNS]), { encoding: 'utf-8', flag: 'wx' });
        } catch (error) {
            if (!hasErrorCode(error, 'EEXIST')) throw error;
        }
        this.headerReady = true;
    }
}
