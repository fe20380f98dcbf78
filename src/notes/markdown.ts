import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { BridgeRunSummary } from '../types/index.js';
import { bridgeHealth } from '../core/summary.js';
import { parseReplacementJson, ReplacementMap } from '../processors/replacements.js';
import { errorMessage } from '../utils/errors.js';
import { modifiedTime, writeFileAtomic } from '../utils/fs.js';
import { NoteContext, NoteMetadata, NoteProvider } from './types.js';

export const META_DIR = '.notebridge';

/**
 * Plain Markdown folders: body-only notes, metadata and status as JSON
 * under <vault>/.notebridge, file:// links
 */
export class MarkdownNoteProvider implements NoteProvider {
    readonly type = 'markdown';

    async writeNote(content: string, metadata: NoteMetadata, relativePath: string, ctx: NoteContext): Promise<string> {
        const path = join(ctx.vaultPath, relativePath);
        await writeFileAtomic(path, content);

        // The sidecar tree mirrors the vault tree
        await writeFileAtomic(
            join(ctx.vaultPath, META_DIR, 'metadata', `${relativePath}.json`),
            JSON.stringify({
                title: metadata.title,
                tags: metadata.tags,
                source_file: metadata.sourceFile,
                created_date: metadata.createdDate,
            }, null, 2)
        );
        return path;
    }

    buildNoteUrl(relativePath: string, ctx: NoteContext): string {
        return pathToFileURL(join(ctx.vaultPath, relativePath)).href;
    }

    getNoteModifiedTime(relativePath: string, ctx: NoteContext): Promise<number | null> {
        return modifiedTime(join(ctx.vaultPath, relativePath));
    }

    async writeStatusNote(summary: BridgeRunSummary, ctx: NoteContext): Promise<string> {
        const path = join(ctx.vaultPath, META_DIR, `status-${ctx.bridgeName}.json`);
        const status = {
            last_run: summary.timestamp,
            bridge_name: ctx.bridgeName,
            vault_path: ctx.vaultPath,
            health: bridgeHealth(summary),
            stats: {
                notes_found: summary.notesFound,
                converted: summary.converted,
                skipped: summary.skipped,
                no_text: summary.noText,
                tool_missing: summary.toolMissing,
                tool_failed: summary.toolFailed,
                tasks_total: summary.tasksTotal,
                tasks_open: summary.tasksOpen,
                tasks_completed: summary.tasksCompleted,
            },
            errors: {
                supernote_missing: summary.sourceMissing,
                vault_missing: summary.vaultMissing,
            },
        };
        await writeFileAtomic(path, JSON.stringify(status, null, 2));
        return path;
    }

    async loadReplacements(ctx: NoteContext): Promise<ReplacementMap> {
        const path = join(ctx.vaultPath, META_DIR, `replacements-${ctx.bridgeName}.json`);

        if (!existsSync(path)) {
            await this.ensureReplacementsTemplate(path, ctx);
            return {};
        }

        try {
            const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
            return parseReplacementJson(raw);
        } catch (error) {
            ctx.logger.warn(`Failed to load replacements from ${path}: ${errorMessage(error)}`);
            return {};
        }
    }

    private async ensureReplacementsTemplate(path: string, ctx: NoteContext): Promise<void> {
        const example = {
            _comment: 'Whole-word replacements as "wrong": "right" pairs. Keys starting with _ are ignored.',
            _example: 'teh -> the',
        };
        try {
            await writeFileAtomic(path, JSON.stringify(example, null, 2));
            ctx.logger.info(`Created replacements template at ${path}`);
        } catch (error) {
            ctx.logger.warn(`Failed to create replacements template at ${path}: ${errorMessage(error)}`);
        }
    }
}
