/**
 * Small filesystem predicates
 */

import * as fs from 'fs/promises';

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
    return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code);
}

export function isNotFound(error: unknown): boolean {
    return hasErrorCode(error, 'ENOENT', 'ENOTDIR');
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.stat(filePath);
        return stats.isFile();
    } catch (error) {
        if (isNotFound(error)) return false;
        throw error;
    }
}
