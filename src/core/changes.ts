import { SourceNote } from '../types/index.js';
import { NoteContext, NoteProvider } from '../notes/types.js';

/**
 * A source note whose Markdown must be (re)written
 */
export interface StaleNote {
    note: SourceNote;
    destination: string;    // vault-relative .md path
    reason: 'new' | 'modified';
}

/**
 * Change set of one bridge scan
 */
export interface ChangeSet {
    stale: StaleNote[];
    upToDate: SourceNote[];
}

/**
 * Vault-relative Markdown path mirroring a source note path
 */
export function destinationPath(relativePath: string): string {
    return relativePath.replace(/\.[^./]*$/, '') + '.md';
}

/**
 * A destination is stale when it is missing or strictly older than its source.
 * Equal timestamps count as up to date.
 */
export function isStale(sourceMtimeMs: number, destinationMtimeMs: number | null): boolean {
    return destinationMtimeMs === null || destinationMtimeMs < sourceMtimeMs;
}

/**
 * Change detector - compares source notes against the vault by mtime
 */
export class ChangeDetector {
    constructor(
        private notes: NoteProvider,
        private ctx: NoteContext
    ) { }

    /**
     * Split scanned notes into stale and up-to-date
     */
    async detectChanges(sourceNotes: SourceNote[]): Promise<ChangeSet> {
        const changes: ChangeSet = { stale: [], upToDate: [] };

        for (const note of sourceNotes) {
            const destination = destinationPath(note.relativePath);
            const destinationMtime = await this.notes.getNoteModifiedTime(destination, this.ctx);

            if (!isStale(note.mtimeMs, destinationMtime)) {
                changes.upToDate.push(note);
            } else {
                changes.stale.push({
                    note,
                    destination,
                    reason: destinationMtime === null ? 'new' : 'modified',
                });
            }
        }

        return changes;
    }
}
