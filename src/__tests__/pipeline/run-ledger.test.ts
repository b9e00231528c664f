import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { LEDGER_COLUMNS, RunLedger, readLedger, type LedgerRunInfo } from '../../pipeline/run-ledger';
import { FetchError } from '../../pipeline/errors';
import { candidate, makeTempDir, removeDir } from '../helpers';

const info: LedgerRunInfo = {
    runId: 'run-1',
    model: 'medium.en',
    device: 'cpu',
    computeType: 'int8',
    diarize: true,
};

const timings = {
    startedAt: new Date('2024-03-04T10:00:00.000Z'),
    endedAt: new Date('2024-03-04T10:00:10.000Z'),
};

describe('RunLedger', () => {
    let root: string;
    let ledgerPath: string;

    beforeEach(async () => {
        root = await makeTempDir();
        ledgerPath = path.join(root, 'logs', 'run_log.csv');
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('should write the header once across ledgers on the same file', async () => {
        await new RunLedger(ledgerPath, info).recordAttempt(candidate('a.mp4'), 'success', timings);
        await new RunLedger(ledgerPath, { ...info, runId: 'run-2' }).recordAttempt(candidate('a.mp4'), 'skipped', timings);

        const lines = (await fs.readFile(ledgerPath, 'utf-8')).split('\n');
        expect(lines[0]).toBe(LEDGER_COLUMNS.join(','));
        expect(lines.filter(line => line.startsWith('run_id'))).toHaveLength(1);
        expect(lines).toHaveLength(4);
    });

    it('should write a success row with seconds and segment count', async () => {
        const ledger = new RunLedger(ledgerPath, info);
        const entry = await ledger.recordAttempt(
            candidate('a.mp4', 2048),
            'success',
            { ...timings, fetchMs: 1500, transcribeMs: 7000, writeMs: 250 },
            { segments: 12 }
        );

        expect(entry).toEqual({
            runId: 'run-1',
            filename: 'a.mp4',
            sourcePath: 'a.mp4',
            sizeBytes: 2048,
            modifiedAt: '2024-03-04T09:00:00.000Z',
            outcome: 'success',
            startedAt: '2024-03-04T10:00:00.000Z',
            endedAt: '2024-03-04T10:00:10.000Z',
            wallTimeSeconds: 10,
            fetchSeconds: 1.5,
            transcribeSeconds: 7,
            writeSeconds: 0.25,
            segments: 12,
            model: 'medium.en',
            device: 'cpu',
            computeType: 'int8',
            diarize: true,
        });

        expect(await ledger.readEntries()).toEqual([entry]);
    });

    it('should keep an error message with commas, quotes and newlines in one row', async () => {
        const ledger = new RunLedger(ledgerPath, info);
        const error = new FetchError('rclone exited with code 1: "quota", retry\nlater');

        await ledger.recordAttempt(candidate('b.mp4'), 'failure', timings, { error });
        await ledger.recordAttempt(candidate('c.mp4'), 'success', timings);

        const entries = await ledger.readEntries();
        expect(entries).toHaveLength(2);
        expect(entries[0].errorCode).toBe('FETCH_FAILED');
        expect(entries[0].error).toBe('rclone exited with code 1: "quota", retry\nlater');
        expect(entries[1].filename).toBe('c.mp4');
    });

    it('should leave absent steps empty', async () => {
        const ledger = new RunLedger(ledgerPath, info);
        await ledger.recordAttempt(candidate('a.mp4'), 'skipped', timings);

        const [entry] = await ledger.readEntries();
        expect(entry.fetchSeconds).toBeUndefined();
        expect(entry.segments).toBeUndefined();
        expect(entry.error).toBeUndefined();
    });

    it('should read a missing ledger as empty', async () => {
        expect(await readLedger(path.join(root, 'none.csv'))).toEqual([]);
    });
});
