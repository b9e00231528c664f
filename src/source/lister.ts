/**
 * Source lister
 *
 * Enumerates candidate media files from a local folder or a remote store,
 * metadata only, and copies one candidate at a time into scratch on demand.
 */

import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import * as path from 'path';
import type { CandidateFile } from '../pipeline/types';
import { FetchError, SourceUnavailableError, errorMessage } from '../pipeline/errors';
import { isNotFound } from '../shared/fs-utils';

/**
 * One file reported by a remote store
 */
export interface RemoteEntry {
    /** Path relative to the listed remote path */
    path: string;
    size: number;
    modifiedAt: Date;
}

/**
 * Remote storage transfer tool (rclone)
 */
export interface RemoteAdapter {
    /** Human-readable location, used in log lines */
    describe(remotePath: string): string;
    list(remotePath: string): Promise<RemoteEntry[]>;
    copyToLocal(remotePath: string, localPath: string): Promise<void>;
}

/**
 * Where candidates come from and how their bytes get into scratch
 */
export interface MediaSource {
    readonly description: string;
    list(extensions: readonly string[]): AsyncIterable<CandidateFile>;
    fetch(candidate: CandidateFile, localPath: string): Promise<void>;
}

/**
 * "mp4", ".MP4 " -> ".mp4"; empty entries dropped, duplicates removed
 */
export function normalizeExtensions(extensions: readonly string[]): string[] {
    const normalized = extensions
        .map(ext => ext.trim().toLowerCase())
        .filter(ext => ext.length > 0)
        .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
    return [...new Set(normalized)];
}

export function toCandidate(filePath: string, size: number, modifiedAt: Date): CandidateFile {
    const name = path.basename(filePath);
    const extension = path.extname(name).toLowerCase();
    return Object.freeze({
        path: filePath,
        name,
        stem: path.basename(name, path.extname(name)),
        size,
        modifiedAt,
        extension,
    });
}

function hasAcceptedExtension(fileName: string, accepted: readonly string[]): boolean {
    return accepted.includes(path.extname(fileName).toLowerCase());
}

/**
 * Local folder, walked recursively in name order
 */
export class LocalSource implements MediaSource {
    readonly description: string;

    constructor(private readonly inputDir: string) {
        this.description = inputDir;
    }

    async *list(extensions: readonly string[]): AsyncIterable<CandidateFile> {
        const accepted = normalizeExtensions(extensions);
        let rootStat: Stats;
        try {
            rootStat = await fs.stat(this.inputDir);
        } catch (error) {
            throw new SourceUnavailableError(`Input folder not readable: ${this.inputDir} (${errorMessage(error)})`, { cause: error });
        }
        if (!rootStat.isDirectory()) {
            throw new SourceUnavailableError(`Input path is not a folder: ${this.inputDir}`);
        }

        yield* this.walk(this.inputDir, accepted);
    }

    async fetch(candidate: CandidateFile, localPath: string): Promise<void> {
        try {
            await fs.copyFile(candidate.path, localPath);
        } catch (error) {
            throw new FetchError(`Copy failed for ${candidate.path}: ${errorMessage(error)}`, {
                cause: error,
                context: { file: candidate.path, operation: 'fetch' },
            });
        }
    }

    private async *walk(dir: string, accepted: readonly string[]): AsyncIterable<CandidateFile> {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(dir, { withFileTypes: true });
        } catch (error) {
            throw new SourceUnavailableError(`Cannot list ${dir}: ${errorMessage(error)}`, { cause: error });
        }

        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const entry of entries) {
            if (entry.name.startsWith('.')) continue;
            const fullPath = path.join(dir, entry.name);

            if (entry.isDirectory()) {
                yield* this.walk(fullPath, accepted);
                continue;
            }
            if (!(entry.isFile() || entry.isSymbolicLink()) || !hasAcceptedExtension(entry.name, accepted)) continue;

            // stat follows links; dangling links and files removed mid-walk are skipped
            let stats: Stats;
            try {
                stats = await fs.stat(fullPath);
            } catch (error) {
                if (isNotFound(error)) continue;
                throw new SourceUnavailableError(`Cannot read ${fullPath}: ${errorMessage(error)}`, { cause: error });
            }
            if (stats.isFile()) {
                yield toCandidate(fullPath, stats.size, stats.mtime);
            }
        }
    }
}

/**
 * Remote store behind a RemoteAdapter; oldest recordings first
 */
export class RemoteSource implements MediaSource {
    readonly description: string;

    constructor(
        private readonly adapter: RemoteAdapter,
        private readonly remotePath: string
    ) {
        this.description = adapter.describe(remotePath);
    }

    async *list(extensions: readonly string[]): AsyncIterable<CandidateFile> {
        const accepted = normalizeExtensions(extensions);
        let entries: RemoteEntry[];
        try {
            entries = await this.adapter.list(this.remotePath);
        } catch (error) {
            throw new SourceUnavailableError(`Cannot list ${this.description}: ${errorMessage(error)}`, { cause: error });
        }

        const sorted = entries
            .filter(entry => hasAcceptedExtension(entry.path, accepted))
            .sort((a, b) => {
                const byTime = a.modifiedAt.getTime() - b.modifiedAt.getTime();
                if (byTime !== 0) return byTime;
                return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
            });

        for (const entry of sorted) {
            yield toCandidate(entry.path, entry.size, entry.modifiedAt);
        }
    }

    async fetch(candidate: CandidateFile, localPath: string): Promise<void> {
        const remoteFile = joinRemotePath(this.remotePath, candidate.path);
        try {
            await this.adapter.copyToLocal(remoteFile, localPath);
        } catch (error) {
            throw new FetchError(`Transfer failed for ${remoteFile}: ${errorMessage(error)}`, {
                cause: error,
                context: { file: candidate.path, operation: 'fetch' },
            });
        }
    }
}

export function joinRemotePath(base: string, relative: string): string {
    const trimmed = base.replace(/\/+$/, '');
    return trimmed.length > 0 ? `${trimmed}/${relative}` : relative;
}

/**
 * Lazily enumerate candidates of a source
 */
export function listCandidates(source: MediaSource, extensions: readonly string[]): AsyncIterable<CandidateFile> {
    return source.list(extensions);
}
