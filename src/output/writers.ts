/**
 * File writers for each output format
 */

import * as fs from 'fs/promises';
import type { TranscriptResult } from '../pipeline/types';
import type { OutputFormat, OutputWriter } from './types';
import { renderCsv, renderJson, renderSrt, renderTxt, renderVtt } from './formatters';

type Renderer = (result: TranscriptResult, sourceName: string) => string;

const RENDERERS: Record<OutputFormat, Renderer> = {
    json: renderJson,
    srt: renderSrt,
    vtt: renderVtt,
    txt: renderTxt,
    csv: renderCsv,
};

export function createWriter(format: OutputFormat): OutputWriter {
    const render = RENDERERS[format];
    const extension = `.${format}`;
    return {
        format,
        extension,
        async write(result, stemPath, sourceName) {
            const filePath = `${stemPath}${extension}`;
            await fs.writeFile(filePath, render(result, sourceName), 'utf-8');
            return filePath;
        },
    };
}

/**
 * One writer per requested format, in request order, duplicates dropped
 */
export function createWriters(formats: readonly OutputFormat[]): OutputWriter[] {
    return [...new Set(formats)].map(createWriter);
}
