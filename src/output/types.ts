/**
 * Output writer contract
 */

import type { TranscriptResult } from '../pipeline/types';

export const OUTPUT_FORMATS = ['json', 'srt', 'vtt', 'txt', 'csv'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface OutputWriter {
    readonly format: OutputFormat;

    /** Extension appended to the stem, with leading dot */
    readonly extension: string;

    /**
     * Serialize `result` to `${stemPath}${extension}`.
     * @param sourceName original media file name, recorded where the format has room for it
     * @returns the path written
     */
    write(result: TranscriptResult, stemPath: string, sourceName: string): Promise<string>;
}
