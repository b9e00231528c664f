import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ScratchLifecycleManager } from '../../pipeline/scratch-lifecycle';
import { CompletionRegistry } from '../../pipeline/completion-registry';
import { PipelineErrorCode } from '../../pipeline/errors';
import { createWriters } from '../../output/writers';
import { FakeSource, FakeTranscriber, TRANSCRIPTION, candidate, makeTempDir, removeDir } from '../helpers';

describe('ScratchLifecycleManager', () => {
    let root: string;
    let scratchDir: string;
    let outputDir: string;
    let source: FakeSource;
    let transcriber: FakeTranscriber;
    let manager: ScratchLifecycleManager;

    beforeEach(async () => {
        root = await makeTempDir();
        scratchDir = path.join(root, 'scratch');
        outputDir = path.join(root, 'out');
        source = new FakeSource([]);
        transcriber = new FakeTranscriber();
        manager = new ScratchLifecycleManager({
            scratchDir,
            outputDir,
            source,
            transcriber,
            transcription: TRANSCRIPTION,
            writers: createWriters(['json', 'vtt']),
            registry: new CompletionRegistry(outputDir),
        });
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('should fetch, transcribe, write, mark and purge', async () => {
        const result = await manager.process(candidate('lesson.mp4'));

        expect(result.status).toBe('success');
        if (result.status === 'success') {
            expect(result.segments).toBe(2);
            expect(result.timings.fetchMs).toBeGreaterThanOrEqual(0);
            expect(result.timings.transcribeMs).toBeGreaterThanOrEqual(0);
            expect(result.timings.writeMs).toBeGreaterThanOrEqual(0);
        }
        expect((await fs.readdir(outputDir)).sort()).toEqual(['.partial', 'lesson.done', 'lesson.json', 'lesson.vtt']);
        expect(await fs.readdir(scratchDir)).toEqual([]);
        expect(manager.residentCopy).toBeNull();
    });

    it('should hand the scratch copy to the engine', async () => {
        await manager.process(candidate('lesson.mp4'));
        expect(transcriber.calls).toEqual(['lesson.mp4']);
        expect(source.fetched).toEqual(['lesson.mp4']);
    });

    it('should record the source name in the JSON transcript', async () => {
        await manager.process(candidate('lesson.mp4'));
        const json: unknown = JSON.parse(await fs.readFile(path.join(outputDir, 'lesson.json'), 'utf-8'));
        expect(json).toMatchObject({ file: 'lesson.mp4', language: 'en', speakers: ['SPEAKER_00', 'SPEAKER_01'] });
    });

    it('should refuse a second copy while one is resident', async () => {
        const first = manager.process(candidate('a.mp4'));
        await expect(manager.process(candidate('b.mp4'))).rejects.toThrow('Scratch copy already resident');
        await first;
        expect(source.fetched).toEqual(['a.mp4']);
    });

    it('should return engine failures as TranscriptionError results', async () => {
        transcriber.failFor.add('a.mp4');

        const result = await manager.process(candidate('a.mp4'));

        expect(result.status).toBe('failure');
        if (result.status === 'failure') {
            expect(result.error.code).toBe(PipelineErrorCode.TRANSCRIPTION_FAILED);
            expect(result.error.message).toBe('engine crashed');
            expect(result.timings.writeMs).toBeUndefined();
        }
        expect(await fs.readdir(scratchDir)).toEqual([]);
    });

    it('should sweep leftovers from scratch and staging', async () => {
        await fs.mkdir(scratchDir, { recursive: true });
        await fs.writeFile(path.join(scratchDir, 'crashed.mp4'), 'x');
        await fs.mkdir(path.join(outputDir, '.partial'), { recursive: true });
        await fs.writeFile(path.join(outputDir, '.partial', 'crashed.json'), '{}');

        const removed = await manager.sweep();

        expect(removed).toEqual(['crashed.mp4']);
        expect(await fs.readdir(scratchDir)).toEqual([]);
        expect(await fs.readdir(outputDir)).toEqual([]);
    });

    it('should only remove top-level files from scratch', async () => {
        await fs.mkdir(path.join(scratchDir, 'keep'), { recursive: true });
        await fs.writeFile(path.join(scratchDir, 'keep', 'a.done'), '');
        await fs.writeFile(path.join(scratchDir, 'crashed.mp4'), 'x');

        const removed = await manager.sweep();

        expect(removed).toEqual(['crashed.mp4']);
        expect(await fs.readdir(scratchDir)).toEqual(['keep']);
        expect(await fs.readdir(path.join(scratchDir, 'keep'))).toEqual(['a.done']);
    });
});
