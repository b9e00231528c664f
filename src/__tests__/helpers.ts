/**
 * Shared fakes for pipeline tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { CandidateFile, TranscriptResult } from '../pipeline/types';
import { toCandidate, type MediaSource } from '../source/lister';
import type { Transcriber, TranscriptionOptions } from '../transcription/types';
import { BatchController } from '../pipeline/batch-controller';
import { CompletionRegistry } from '../pipeline/completion-registry';
import { DiskGuard, BYTES_PER_GB, type DiskGuardPolicy, type FreeSpaceProbe } from '../pipeline/disk-guard';
import { RunLedger } from '../pipeline/run-ledger';
import { ScratchLifecycleManager } from '../pipeline/scratch-lifecycle';
import { createWriters } from '../output/writers';
import type { OutputFormat, OutputWriter } from '../output/types';

export async function makeTempDir(prefix = 'ct-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export function candidate(name: string, size = 1000, modifiedAt = new Date('2024-03-04T09:00:00Z')): CandidateFile {
    return toCandidate(name, size, modifiedAt);
}

export const TRANSCRIPTION: TranscriptionOptions = {
    model: 'medium.en',
    device: 'cpu',
    computeType: 'int8',
    diarize: false,
};

export function sampleResult(): TranscriptResult {
    return {
        language: 'en',
        speakers: ['SPEAKER_00', 'SPEAKER_01'],
        segments: [
            { start: 0, end: 2.5, text: 'Good morning class', speaker: 'SPEAKER_00' },
            { start: 2.5, end: 4, text: 'Morning', speaker: 'SPEAKER_01' },
        ],
    };
}

/**
 * Counts files in the scratch directory at every observation point
 */
export class FootprintProbe {
    maxResident = 0;

    constructor(private readonly scratchDir: string) {}

    async observe(): Promise<number> {
        const names = await fs.readdir(this.scratchDir);
        this.maxResident = Math.max(this.maxResident, names.length);
        return names.length;
    }
}

/**
 * In-memory source; fetch writes a small placeholder file
 */
export class FakeSource implements MediaSource {
    readonly description = 'fake://recordings';
    readonly fetched: string[] = [];
    readonly failFetch = new Set<string>();
    listed = 0;
    footprint?: FootprintProbe;

    constructor(private readonly files: CandidateFile[]) {}

    async *list(): AsyncIterable<CandidateFile> {
        for (const file of this.files) {
            this.listed++;
            yield file;
        }
    }

    async fetch(file: CandidateFile, localPath: string): Promise<void> {
        this.fetched.push(file.name);
        if (this.failFetch.has(file.name)) {
            await fs.writeFile(localPath, 'partial');
            throw new Error('connection reset');
        }
        await fs.writeFile(localPath, file.size === 0 ? '' : `media:${file.name}`);
        await this.footprint?.observe();
    }
}

export class FakeTranscriber implements Transcriber {
    readonly calls: string[] = [];
    readonly failFor = new Set<string>();
    footprint?: FootprintProbe;
    onTranscribe?: (name: string, localPath: string) => Promise<void> | void;

    async transcribe(localPath: string): Promise<TranscriptResult> {
        const name = path.basename(localPath);
        this.calls.push(name);
        await this.footprint?.observe();
        await this.onTranscribe?.(name, localPath);
        if (this.failFor.has(name)) {
            throw new Error('engine crashed');
        }
        return sampleResult();
    }
}

export interface HarnessOptions {
    files: CandidateFile[];
    formats?: OutputFormat[];
    writers?: OutputWriter[];
    maxFiles?: number;
    force?: boolean;
    probe?: FreeSpaceProbe;
    policy?: DiskGuardPolicy;
    minFreeGB?: number;
    maxWaitMs?: number;
    runId?: string;
    /** Replaces the fake source in the lifecycle and controller */
    sourceOverride?: MediaSource;
}

export interface Harness {
    root: string;
    scratchDir: string;
    outputDir: string;
    source: FakeSource;
    transcriber: FakeTranscriber;
    footprint: FootprintProbe;
    registry: CompletionRegistry;
    lifecycle: ScratchLifecycleManager;
    ledger: RunLedger;
    controller: BatchController;
    sleeps: number[];
}

const plentyOfSpace: FreeSpaceProbe = async () => 100 * BYTES_PER_GB;

/**
 * A full controller over temp directories, fake source and fake engine.
 * Pass `root` to reuse directories across invocations.
 */
export async function createHarness(options: HarnessOptions, root?: string): Promise<Harness> {
    const base = root ?? await makeTempDir();
    const scratchDir = path.join(base, 'scratch');
    const outputDir = path.join(base, 'out');
    await fs.mkdir(scratchDir, { recursive: true });

    const footprint = new FootprintProbe(scratchDir);
    const source = new FakeSource(options.files);
    source.footprint = footprint;
    const transcriber = new FakeTranscriber();
    transcriber.footprint = footprint;

    const registry = new CompletionRegistry(outputDir, options.force ?? false);
    const sleeps: number[] = [];
    const guard = new DiskGuard({
        scratchDir,
        minFreeGB: options.minFreeGB ?? 4,
        policy: options.policy ?? 'fail-fast',
        checkIntervalMs: 1000,
        maxWaitMs: options.maxWaitMs ?? 10_000,
        probe: options.probe ?? plentyOfSpace,
        sleep: async (ms) => {
            sleeps.push(ms);
        },
    });

    const lifecycle = new ScratchLifecycleManager({
        scratchDir,
        outputDir,
        source: options.sourceOverride ?? source,
        transcriber,
        transcription: TRANSCRIPTION,
        writers: options.writers ?? createWriters(options.formats ?? ['json', 'srt', 'txt']),
        registry,
    });

    const ledger = new RunLedger(path.join(outputDir, 'run_log.csv'), {
        runId: options.runId ?? 'run-1',
        model: TRANSCRIPTION.model,
        device: TRANSCRIPTION.device,
        computeType: TRANSCRIPTION.computeType,
        diarize: TRANSCRIPTION.diarize,
    });

    const controller = new BatchController({
        source: options.sourceOverride ?? source,
        extensions: ['.mp4'],
        registry,
        guard,
        lifecycle,
        ledger,
        limits: { maxFiles: options.maxFiles ?? 0 },
    });

    return {
        root: base,
        scratchDir,
        outputDir,
        source,
        transcriber,
        footprint,
        registry,
        lifecycle,
        ledger,
        controller,
        sleeps,
    };
}
