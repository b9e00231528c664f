import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createStatusApp, listTranscripts, startStatusApi } from '../../status/status-api';
import { CompletionRegistry } from '../../pipeline/completion-registry';
import { RunLedger, type LedgerRunInfo } from '../../pipeline/run-ledger';
import { TranscriptionError } from '../../pipeline/errors';
import { candidate, makeTempDir, removeDir } from '../helpers';

const info: LedgerRunInfo = { runId: 'run-1', model: 'medium.en', device: 'cpu', computeType: 'int8', diarize: false };

function at(iso: string): { startedAt: Date; endedAt: Date } {
    return { startedAt: new Date(iso), endedAt: new Date(iso) };
}

describe('status API', () => {
    let outputDir: string;
    let server: Server;
    let baseUrl: string;

    beforeAll(async () => {
        outputDir = await makeTempDir();
        const runLog = path.join(outputDir, 'run_log.csv');

        await fs.writeFile(path.join(outputDir, 'a.json'), '{}');
        await fs.writeFile(path.join(outputDir, 'a.srt'), '');
        await new CompletionRegistry(outputDir).markComplete(candidate('a.mp4'));
        await fs.writeFile(path.join(outputDir, 'b.json'), '{}');
        await fs.writeFile(path.join(outputDir, 'notes.md'), '');
        await fs.mkdir(path.join(outputDir, '.partial'));

        await new RunLedger(runLog, info).recordAttempt(candidate('a.mp4'), 'success', at('2024-03-04T10:00:00.000Z'), { segments: 2 });
        const second = new RunLedger(runLog, { ...info, runId: 'run-2' });
        await second.recordAttempt(candidate('a.mp4'), 'skipped', at('2024-03-05T10:00:00.000Z'));
        await second.recordAttempt(candidate('b.mp4'), 'failure', at('2024-03-05T10:05:00.000Z'), {
            error: new TranscriptionError('engine crashed'),
        });

        server = await startStatusApi(createStatusApp({ outputDir, runLog }), 0);
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('status API did not bind a port');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        await removeDir(outputDir);
    });

    it('should summarise markers, the ledger and the latest run', async () => {
        const res = await fetch(`${baseUrl}/status`);

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({
            outputDir,
            completed: 1,
            ledger: { total: 3, success: 1, failure: 1, skipped: 1 },
            lastRun: {
                runId: 'run-2',
                startedAt: '2024-03-05T10:00:00.000Z',
                endedAt: '2024-03-05T10:05:00.000Z',
                success: 0,
                failure: 1,
                skipped: 1,
            },
        });
    });

    it('should filter ledger entries by run', async () => {
        const res = await fetch(`${baseUrl}/ledger?runId=run-2`);
        const body: unknown = await res.json();

        expect(body).toMatchObject({
            entries: [
                { runId: 'run-2', filename: 'a.mp4', outcome: 'skipped' },
                { runId: 'run-2', filename: 'b.mp4', outcome: 'failure', errorCode: 'TRANSCRIPTION_FAILED', error: 'engine crashed' },
            ],
        });
    });

    it('should list transcripts without the ledger or unrelated files', async () => {
        const res = await fetch(`${baseUrl}/transcripts`);

        expect(await res.json()).toEqual({
            transcripts: [
                { stem: 'a', complete: true, artifacts: ['json', 'srt'] },
                { stem: 'b', complete: false, artifacts: ['json'] },
            ],
        });
    });

    it('should answer health checks', async () => {
        const res = await fetch(`${baseUrl}/health`);
        expect(await res.json()).toEqual({ status: 'ok' });
    });
});

describe('listTranscripts', () => {
    it('should return nothing for a missing directory', async () => {
        expect(await listTranscripts('/nonexistent/transcripts')).toEqual([]);
    });
});
