/**
 * Write-then-rename helper. Readers of the target path see either the old
 * content or the complete new content, never a partial file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

let counter = 0;

function tempPathFor(filePath: string): string {
    counter += 1;
    return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.${counter}.tmp`);
}

/**
 * Write content to a temp file beside the target, fsync it, then rename it over the target.
 */
export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
    const tmpPath = tempPathFor(filePath);
    const handle = await fs.open(tmpPath, 'w');

    try {
        try {
            await handle.writeFile(content);
            await handle.sync();
        } finally {
            await handle.close();
        }
        await fs.rename(tmpPath, filePath);
    } catch (error) {
        // No temp file is left beside the target, whichever step failed
        await fs.rm(tmpPath, { force: true });
        throw error;
    }
}

