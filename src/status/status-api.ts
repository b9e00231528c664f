/**
 * Status API Server
 *
 * Read-only HTTP view over an output directory: completion markers,
 * artifacts per stem and the run ledger.
 */

import express, { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import * as fs from 'fs/promises';
import * as path from 'path';
import { MARKER_EXTENSION, listCompletedStems } from '../pipeline/completion-registry';
import { readLedger } from '../pipeline/run-ledger';
import { errorMessage } from '../pipeline/errors';
import type { AttemptOutcome, RunLedgerEntry } from '../pipeline/types';
import { OUTPUT_FORMATS, type OutputFormat } from '../output/types';
import { isNotFound } from '../shared/fs-utils';

export const DEFAULT_STATUS_PORT = 3456;

export interface StatusApiOptions {
    outputDir: string;
    runLog: string;
}

export interface TranscriptListing {
    stem: string;
    complete: boolean;
    artifacts: OutputFormat[];
}

type OutcomeCounts = Record<AttemptOutcome, number>;

function countOutcomes(entries: RunLedgerEntry[]): OutcomeCounts {
    const counts: OutcomeCounts = { success: 0, failure: 0, skipped: 0 };
    for (const entry of entries) counts[entry.outcome]++;
    return counts;
}

function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Every stem with a marker or an artifact, sorted. `ignore` holds file names
 * that live in the output directory but are not transcripts (the ledger).
 */
export async function listTranscripts(outputDir: string, ignore: readonly string[] = []): Promise<TranscriptListing[]> {
    let names: string[];
    try {
        names = await fs.readdir(outputDir);
    } catch (error) {
        if (isNotFound(error)) return [];
        throw error;
    }

    const completed = new Set(await listCompletedStems(outputDir));
    const byStem = new Map<string, OutputFormat[]>();

    for (const name of names) {
        if (name.startsWith('.') || ignore.includes(name)) continue;
        const ext = path.extname(name);
        const stem = path.basename(name, ext);
        const format = ext.slice(1);
        if (ext === MARKER_EXTENSION) {
            if (!byStem.has(stem)) byStem.set(stem, []);
        } else if (isOutputFormat(format)) {
            const artifacts = byStem.get(stem) ?? [];
            artifacts.push(format);
            byStem.set(stem, artifacts);
        }
    }

    return [...byStem.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([stem, artifacts]) => ({
            stem,
            complete: completed.has(stem),
            artifacts: OUTPUT_FORMATS.filter(format => artifacts.includes(format)),
        }));
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

export function createStatusApp(options: StatusApiOptions): express.Express {
    const { outputDir, runLog } = options;
    const ledgerName = path.relative(outputDir, runLog);
    const app = express();

    /**
     * GET /status
     * Marker count, ledger totals and the latest run's counts
     */
    app.get('/status', route(async (req, res) => {
        const [completed, entries] = await Promise.all([listCompletedStems(outputDir), readLedger(runLog)]);
        const last = entries.at(-1);
        const lastRunEntries = last ? entries.filter(entry => entry.runId === last.runId) : [];

        res.json({
            outputDir,
            completed: completed.length,
            ledger: { total: entries.length, ...countOutcomes(entries) },
            lastRun: last
                ? {
                    runId: last.runId,
                    startedAt: lastRunEntries[0]?.startedAt ?? last.startedAt,
                    endedAt: last.endedAt,
                    ...countOutcomes(lastRunEntries),
                }
                : null,
        });
    }));

    /**
     * GET /ledger?runId=...
     */
    app.get('/ledger', route(async (req, res) => {
        const runId = typeof req.query.runId === 'string' ? req.query.runId : undefined;
        const entries = await readLedger(runLog);
        res.json({ entries: runId ? entries.filter(entry => entry.runId === runId) : entries });
    }));

    /**
     * GET /transcripts
     */
    app.get('/transcripts', route(async (req, res) => {
        res.json({ transcripts: await listTranscripts(outputDir, [ledgerName]) });
    }));

    /**
     * Health check
     */
    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        res.status(500).json({ error: errorMessage(error) });
    });

    return app;
}

export function startStatusApi(app: express.Express, port: number = DEFAULT_STATUS_PORT): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            resolve(server);
        });
        server.once('error', reject);
    });
}
