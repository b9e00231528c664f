/**
 * Pipeline data model
 *
 * Shared by the source lister, completion registry, scratch lifecycle,
 * run ledger and batch controller.
 */

import type { PipelineError, PipelineErrorCode } from './errors';

/**
 * A media file eligible for processing, identified by metadata only
 */
export interface CandidateFile {
    /** Logical path: remote-relative for rclone sources, absolute for local ones */
    readonly path: string;

    /** Base name with extension (e.g. "2024-03-04 Period 2.mp4") */
    readonly name: string;

    /** Base name without extension, shared by every output artifact */
    readonly stem: string;

    /** Size in bytes as reported by the source */
    readonly size: number;

    readonly modifiedAt: Date;

    /** Lower-case extension with leading dot */
    readonly extension: string;
}

export interface TranscriptSegment {
    /** Start time in seconds */
    start: number;

    /** End time in seconds */
    end: number;

    text: string;

    /** Diarization label (e.g. "SPEAKER_00") */
    speaker?: string;

    /** Mean word probability (0-1) */
    confidence?: number;
}

export interface TranscriptResult {
    segments: TranscriptSegment[];

    /** Detected or requested language code */
    language?: string;

    /** Distinct speaker labels, in order of first appearance */
    speakers?: string[];
}

export type AttemptOutcome = 'success' | 'failure' | 'skipped';

/**
 * Wall-clock timings of one attempt. Step durations are absent for
 * steps that never ran.
 */
export interface AttemptTimings {
    startedAt: Date;
    endedAt: Date;
    fetchMs?: number;
    transcribeMs?: number;
    writeMs?: number;
}

export type ProcessResult =
    | { status: 'success'; segments: number; timings: AttemptTimings }
    | { status: 'failure'; error: PipelineError; timings: AttemptTimings };

/**
 * One row of the run ledger
 */
export interface RunLedgerEntry {
    runId: string;
    filename: string;
    sourcePath: string;
    sizeBytes: number;
    modifiedAt: string;
    outcome: AttemptOutcome;
    startedAt: string;
    endedAt: string;
    wallTimeSeconds: number;
    fetchSeconds?: number;
    transcribeSeconds?: number;
    writeSeconds?: number;
    segments?: number;
    model: string;
    device: string;
    computeType: string;
    diarize: boolean;
    errorCode?: string;
    error?: string;
}

export type StopReason = 'exhausted' | 'limit' | 'cancelled' | 'fatal';

export interface RunSummary {
    runId: string;
    startedAt: Date;
    endedAt: Date;

    /** Candidates produced by the lister before the run ended */
    listed: number;

    /** succeeded + failed; skips are not processing */
    processed: number;
    succeeded: number;
    failed: number;
    skipped: number;

    stopReason: StopReason;
    fatal?: { code: PipelineErrorCode; message: string };
}

export interface RunLimits {
    /** Maximum files to process in this invocation (0 = unlimited) */
    maxFiles: number;
}
