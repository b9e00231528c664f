import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { exportCsv } from '../../analysis/export-csv';
import { CompletionRegistry } from '../../pipeline/completion-registry';
import { createWriter } from '../../output/writers';
import { renderCsv } from '../../output/formatters';
import { candidate, makeTempDir, removeDir, sampleResult } from '../helpers';

describe('exportCsv', () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await makeTempDir();
        const registry = new CompletionRegistry(outputDir);
        const json = createWriter('json');

        await json.write(sampleResult(), path.join(outputDir, 'a'), 'a.mp4');
        await registry.markComplete(candidate('a.mp4'));

        await json.write(sampleResult(), path.join(outputDir, 'b'), 'b.mp4');
        await fs.writeFile(path.join(outputDir, 'b.csv'), 'old');
        await registry.markComplete(candidate('b.mp4'));

        await registry.markComplete(candidate('c.mp4'));

        await json.write(sampleResult(), path.join(outputDir, 'd'), 'd.mp4');
    });

    afterEach(async () => {
        await removeDir(outputDir);
    });

    it('should export missing CSVs for completed transcripts only', async () => {
        expect(await exportCsv(outputDir)).toEqual({ exported: 1, skipped: 1, errors: 1 });

        expect(await fs.readFile(path.join(outputDir, 'a.csv'), 'utf-8')).toBe(renderCsv(sampleResult()));
        expect(await fs.readFile(path.join(outputDir, 'b.csv'), 'utf-8')).toBe('old');
        await expect(fs.access(path.join(outputDir, 'd.csv'))).rejects.toThrow();
    });

    it('should overwrite existing CSVs when forced', async () => {
        expect(await exportCsv(outputDir, { force: true })).toEqual({ exported: 2, skipped: 0, errors: 1 });
        expect(await fs.readFile(path.join(outputDir, 'b.csv'), 'utf-8')).toBe(renderCsv(sampleResult()));
    });

    it('should report nothing for a missing directory', async () => {
        expect(await exportCsv(path.join(outputDir, 'missing'))).toEqual({ exported: 0, skipped: 0, errors: 0 });
    });
});
