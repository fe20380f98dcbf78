import { BridgeRunSummary, NoteProviderKind } from '../types/index.js';
import { ReplacementMap } from '../processors/replacements.js';
import { Logger } from '../utils/logger.js';

/**
 * Vault a note provider is writing into for one bridge
 */
export interface NoteContext {
    bridgeName: string;
    vaultPath: string;
    vaultName: string;
    reservedFolder: string;
    logger: Logger;
}

export interface NoteMetadata {
    title: string;
    tags: string[];
    sourceFile: string;     // relative path of the source note
    createdDate: string;
}

/**
 * Note provider interface
 */
export interface NoteProvider {
    readonly type: NoteProviderKind;

    /**
     * Write a converted note at `relativePath` inside the vault.
     * Returns the absolute location.
     */
    writeNote(content: string, metadata: NoteMetadata, relativePath: string, ctx: NoteContext): Promise<string>;

    /**
     * Deep link that opens the note at `relativePath`
     */
    buildNoteUrl(relativePath: string, ctx: NoteContext): string;

    /**
     * mtime in milliseconds of the note at `relativePath`, or null when absent
     */
    getNoteModifiedTime(relativePath: string, ctx: NoteContext): Promise<number | null>;

    /**
     * Render the latest run summary into the vault. Returns its location, if any.
     */
    writeStatusNote(summary: BridgeRunSummary, ctx: NoteContext): Promise<string | null>;

    /**
     * Bridge-scoped word corrections. Never throws; failures give {}.
     */
    loadReplacements(ctx: NoteContext): Promise<ReplacementMap>;
}
