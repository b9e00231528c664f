/**
 * Backfill <stem>.csv for completed transcripts that only have JSON
 */

import * as path from 'path';
import { listCompletedStems } from '../pipeline/completion-registry';
import { errorMessage } from '../pipeline/errors';
import { createWriter } from '../output/writers';
import { readTranscriptFile } from '../output/transcript-file';
import { fileExists } from '../shared/fs-utils';
import type { Logger } from '../shared/logger';
import { silentLogger } from '../shared/logger';

export interface ExportCsvOptions {
    /** Overwrite existing CSV files */
    force?: boolean;
    logger?: Logger;
}

export interface ExportCsvSummary {
    exported: number;
    skipped: number;
    errors: number;
}

export async function exportCsv(outputDir: string, options: ExportCsvOptions = {}): Promise<ExportCsvSummary> {
    const logger = options.logger ?? silentLogger;
    const writer = createWriter('csv');
    const summary: ExportCsvSummary = { exported: 0, skipped: 0, errors: 0 };

    for (const stem of await listCompletedStems(outputDir)) {
        const stemPath = path.join(outputDir, stem);
        const jsonPath = `${stemPath}.json`;
        const csvPath = `${stemPath}${writer.extension}`;

        if (!(await fileExists(jsonPath))) {
            logger.warn(`No JSON transcript for ${stem}`);
            summary.errors++;
            continue;
        }
        if (!options.force && (await fileExists(csvPath))) {
            logger.info(`⏭️ CSV exists: ${path.basename(csvPath)}`);
            summary.skipped++;
            continue;
        }

        try {
            const transcript = await readTranscriptFile(jsonPath);
            await writer.write(transcript.result, stemPath, transcript.file);
            logger.info(`✅ Exported ${stem}.json -> ${path.basename(csvPath)}`);
            summary.exported++;
        } catch (error) {
            logger.error(`Export failed for ${stem}: ${errorMessage(error)}`);
            summary.errors++;
        }
    }

    logger.info(`📊 Export: ${summary.exported} exported, ${summary.skipped} skipped, ${summary.errors} errors`);
    return summary;
}
