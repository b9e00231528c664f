/**
 * Completion registry
 *
 * A zero-byte <stem>.done in the output directory is the only signal that a
 * candidate's artifacts are complete. Partial artifacts without it never count.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { CandidateFile } from './types';
import { writeFileAtomic } from '../shared/write-atomic';
import { fileExists, isNotFound } from '../shared/fs-utils';

export const MARKER_EXTENSION = '.done';

export function markerPathFor(outputDir: string, stem: string): string {
    return path.join(outputDir, `${stem}${MARKER_EXTENSION}`);
}

export class CompletionRegistry {
    constructor(
        private readonly outputDir: string,
        private readonly force = false
    ) {}

    markerPath(candidate: CandidateFile): string {
        return markerPathFor(this.outputDir, candidate.stem);
    }

    /**
     * Checked against the filesystem on every call, so a marker deleted by hand
     * mid-run is noticed. Always false when reprocessing is forced.
     */
    async isComplete(candidate: CandidateFile): Promise<boolean> {
        if (this.force) return false;
        return fileExists(this.markerPath(candidate));
    }

    /**
     * Rename a fresh marker over any existing one; the old marker is never
     * removed before the new one is in place.
     */
    async markComplete(candidate: CandidateFile): Promise<void> {
        await writeFileAtomic(this.markerPath(candidate), '');
    }
}

/**
 * Stems with a marker in `outputDir`, sorted; empty when the directory does not exist
 */
export async function listCompletedStems(outputDir: string): Promise<string[]> {
    let names: string[];
    try {
        names = await fs.readdir(outputDir);
    } catch (error) {
        if (isNotFound(error)) return [];
        throw error;
    }
    return names
        .filter(name => name.endsWith(MARKER_EXTENSION) && !name.startsWith('.'))
        .map(name => name.slice(0, -MARKER_EXTENSION.length))
        .sort();
}
