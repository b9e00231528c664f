/**
 * Pipeline assembly: config -> source, guard, lifecycle, ledger, controller
 */

import type { AppConfig } from './config/config';
import { getResolvedPaths, readHfToken } from './config/config';
import { BatchController } from './pipeline/batch-controller';
import { CompletionRegistry } from './pipeline/completion-registry';
import { DiskGuard, type FreeSpaceProbe, type Sleeper } from './pipeline/disk-guard';
import { ConfigError } from './pipeline/errors';
import { RunLedger } from './pipeline/run-ledger';
import { ScratchLifecycleManager } from './pipeline/scratch-lifecycle';
import { LocalSource, RemoteSource, type MediaSource, type RemoteAdapter } from './source/lister';
import { RcloneAdapter } from './source/rclone';
import type { Transcriber, TranscriptionOptions } from './transcription/types';
import { WhisperXTranscriber } from './transcription/whisperx';
import { createWriters } from './output/writers';
import type { Logger } from './shared/logger';
import { silentLogger } from './shared/logger';

/**
 * Collaborators that can be swapped out; defaults talk to the real tools
 */
export interface PipelineOverrides {
    transcriber?: Transcriber;
    remoteAdapter?: RemoteAdapter;
    probe?: FreeSpaceProbe;
    sleep?: Sleeper;
    logger?: Logger;
    runId?: string;
    hfToken?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * 2024-03-04T09:15:02.123Z -> 20240304T091502Z
 */
export function createRunId(now: Date = new Date()): string {
    return now.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

function createSource(config: AppConfig, inputDir: string | undefined, overrides: PipelineOverrides): MediaSource {
    const { rcloneRemote, remotePath, rcloneBinary, copyTimeoutMin } = config.source;
    if (rcloneRemote !== undefined && remotePath !== undefined) {
        const adapter = overrides.remoteAdapter ?? new RcloneAdapter({
            remote: rcloneRemote,
            binary: rcloneBinary,
            copyTimeoutMs: copyTimeoutMin * 60_000,
        });
        return new RemoteSource(adapter, remotePath);
    }
    if (inputDir !== undefined) {
        return new LocalSource(inputDir);
    }
    throw new ConfigError('No source configured');
}

async function transcriptionOptions(config: AppConfig, overrides: PipelineOverrides, logger: Logger): Promise<TranscriptionOptions> {
    const { whisperx } = config;
    const options: TranscriptionOptions = {
        model: whisperx.model,
        device: whisperx.device,
        computeType: whisperx.computeType,
        diarize: whisperx.diarize,
    };
    if (whisperx.language) options.language = whisperx.language;
    if (whisperx.batchSize !== undefined) options.batchSize = whisperx.batchSize;

    if (whisperx.diarize) {
        const token = overrides.hfToken ?? await readHfToken(config, overrides.env);
        if (!token) {
            throw new ConfigError(`Diarization needs a Hugging Face token in ${whisperx.hfTokenEnv} or hfTokenFile`);
        }
        options.hfToken = token;
        if (whisperx.minSpeakers !== undefined) options.minSpeakers = whisperx.minSpeakers;
        if (whisperx.maxSpeakers !== undefined) options.maxSpeakers = whisperx.maxSpeakers;
        logger.info('🗣️ Diarization enabled');
    }

    return options;
}

/**
 * Wire every component for one invocation
 */
export async function createBatchController(config: AppConfig, overrides: PipelineOverrides = {}): Promise<BatchController> {
    const logger = overrides.logger ?? silentLogger;
    const paths = getResolvedPaths(config, overrides.cwd);
    const transcription = await transcriptionOptions(config, overrides, logger);

    const source = createSource(config, paths.inputDir, overrides);
    const registry = new CompletionRegistry(paths.outputDir, config.force);

    const guard = new DiskGuard({
        scratchDir: paths.scratchDir,
        minFreeGB: config.disk.minFreeGB,
        policy: config.disk.waitIfLow ? 'wait' : 'fail-fast',
        checkIntervalMs: config.disk.checkIntervalS * 1000,
        maxWaitMs: config.disk.maxWaitMin * 60_000,
        probe: overrides.probe,
        sleep: overrides.sleep,
        logger: logger.child('disk-guard'),
    });

    const transcriber = overrides.transcriber ?? new WhisperXTranscriber({
        runtime: config.whisperx.runtime,
        image: config.whisperx.image,
        binary: config.whisperx.binary,
        timeoutMs: config.whisperx.timeoutMin * 60_000,
    });

    const lifecycle = new ScratchLifecycleManager({
        scratchDir: paths.scratchDir,
        outputDir: paths.outputDir,
        source,
        transcriber,
        transcription,
        writers: createWriters(config.formats),
        registry,
        logger: logger.child('lifecycle'),
    });

    const ledger = new RunLedger(paths.runLog, {
        runId: overrides.runId ?? createRunId(),
        model: transcription.model,
        device: transcription.device,
        computeType: transcription.computeType,
        diarize: transcription.diarize,
    });

    return new BatchController({
        source,
        extensions: config.source.includeExt,
        registry,
        guard,
        lifecycle,
        ledger,
        limits: { maxFiles: config.maxFiles },
        logger,
    });
}
