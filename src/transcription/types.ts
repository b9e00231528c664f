/**
 * Transcription collaborator contract
 */

import type { TranscriptResult } from '../pipeline/types';

/**
 * Whisper model sizes accepted by WhisperX
 */
export const WHISPER_MODELS = [
    'tiny', 'tiny.en', 'base', 'base.en', 'small', 'small.en',
    'medium', 'medium.en', 'large', 'large-v1', 'large-v2', 'large-v3',
] as const;
export type WhisperModel = typeof WHISPER_MODELS[number];

export type ComputeDevice = 'cpu' | 'cuda';
export type ComputeType = 'int8' | 'float16' | 'float32';

export interface TranscriptionOptions {
    model: WhisperModel;

    /** Language hint (e.g. 'en'); auto-detect when absent */
    language?: string;

    device: ComputeDevice;
    computeType: ComputeType;

    /** Label speakers (needs a Hugging Face token) */
    diarize: boolean;
    minSpeakers?: number;
    maxSpeakers?: number;

    batchSize?: number;
    hfToken?: string;
}

/**
 * Long-running, resource-heavy black box. Rejects on engine crash,
 * timeout or malformed output.
 */
export interface Transcriber {
    transcribe(localPath: string, options: TranscriptionOptions): Promise<TranscriptResult>;
}
