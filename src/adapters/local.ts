import { readdirSync, statSync, readFileSync, existsSync } from 'fs';
import { join, relative, extname, sep } from 'path';
import { parseIgnoreFile, shouldIgnore, DEFAULT_IGNORE_PATTERNS } from '../utils/ignore.js';
import { SourceNote } from '../types/index.js';
import { SourceAdapter, SourceContext } from './types.js';

export const NOTE_EXTENSION = '.note';
export const IGNORE_FILE = '.notebridgeignore';

/**
 * Local file system adapter
 */
export class LocalAdapter implements SourceAdapter {
    readonly type: 'local' | 'dropbox' = 'local';
    private rootPath: string | null;

    constructor(rootPath?: string) {
        this.rootPath = rootPath ?? null;
    }

    /**
     * Get root path for a bridge
     */
    getRoot(ctx: SourceContext): string | null {
        if (ctx.sourcePath) {
            return ctx.sourcePath;
        }
        if (!this.rootPath || !ctx.sourceSubdir) {
            return null;
        }
        return join(this.rootPath, ctx.sourceSubdir);
    }

    /**
     * Scan the bridge directory and return all note files
     */
    async scan(ctx: SourceContext): Promise<SourceNote[]> {
        const root = this.getRoot(ctx);
        if (!root || !existsSync(root)) {
            return [];
        }

        const patterns = [...DEFAULT_IGNORE_PATTERNS];

        // Load .notebridgeignore if exists
        const ignorePath = join(root, IGNORE_FILE);
        if (existsSync(ignorePath)) {
            patterns.push(...parseIgnoreFile(readFileSync(ignorePath, 'utf-8')));
        }

        const notes: SourceNote[] = [];
        this.scanRecursive(root, root, ctx.bridgeName, patterns, notes);
        return notes.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
    }

    /**
     * Recursively scan directory
     */
    private scanRecursive(
        root: string,
        dir: string,
        bridgeName: string,
        patterns: string[],
        notes: SourceNote[]
    ): void {
        for (const entry of readdirSync(dir)) {
            const absolutePath = join(dir, entry);
            const relativePath = relative(root, absolutePath).split(sep).join('/');

            if (shouldIgnore(relativePath, patterns)) {
                continue;
            }

            let stats;
            try {
                stats = statSync(absolutePath);
            } catch {
                // Removed between readdir and stat
                continue;
            }

            if (stats.isDirectory()) {
                if (entry.startsWith('.')) continue;
                this.scanRecursive(root, absolutePath, bridgeName, patterns, notes);
            } else if (stats.isFile() && extname(entry).toLowerCase() === NOTE_EXTENSION) {
                notes.push({
                    bridgeName,
                    absolutePath,
                    relativePath,
                    mtimeMs: stats.mtimeMs,
                    size: stats.size,
                });
            }
        }
    }
}

/**
 * Notes synced by the Dropbox desktop client. They are plain local files
 * under the Dropbox folder, so scanning is the same as for a local root.
 */
export class DropboxAdapter extends LocalAdapter {
    readonly type = 'dropbox';
}
