import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { stringify as stringifyYaml } from 'yaml';
import { BridgeRunSummary } from '../types/index.js';
import { bridgeHealth, summaryErrors } from '../core/summary.js';
import { parseReplacementNote, ReplacementMap } from '../processors/replacements.js';
import { errorMessage } from '../utils/errors.js';
import { modifiedTime, writeFileAtomic } from '../utils/fs.js';
import { NoteContext, NoteMetadata, NoteProvider } from './types.js';

/**
 * Obsidian vaults: YAML frontmatter, status and replacement notes under the
 * reserved folder, obsidian:// links
 */
export class ObsidianNoteProvider implements NoteProvider {
    readonly type = 'obsidian';

    async writeNote(content: string, metadata: NoteMetadata, relativePath: string, ctx: NoteContext): Promise<string> {
        const path = join(ctx.vaultPath, relativePath);
        const frontmatter = stringifyYaml({
            title: metadata.title,
            date: metadata.createdDate,
            source_note: metadata.sourceFile,
            tags: metadata.tags,
        });
        await writeFileAtomic(path, `---\n${frontmatter}---\n${content}`);
        return path;
    }

    buildNoteUrl(relativePath: string, ctx: NoteContext): string {
        const file = relativePath.replace(/\.md$/i, '');
        return `obsidian://open?vault=${encodeURIComponent(ctx.vaultName)}&file=${encodeURIComponent(file)}`;
    }

    getNoteModifiedTime(relativePath: string, ctx: NoteContext): Promise<number | null> {
        return modifiedTime(join(ctx.vaultPath, relativePath));
    }

    async writeStatusNote(summary: BridgeRunSummary, ctx: NoteContext): Promise<string> {
        const path = join(ctx.vaultPath, ctx.reservedFolder, `Status - ${ctx.bridgeName}.md`);
        await this.ensureReplacementsTemplate(ctx);

        const lines = [
            `# NoteBridge Status - ${ctx.bridgeName}`,
            '',
            `- Last run: ${summary.timestamp}`,
            `- Vault path: \`${ctx.vaultPath}\``,
            `- Health: ${bridgeHealth(summary)}`,
            '',
            '## Summary',
            `- Notes found: ${summary.notesFound}`,
            `- Converted this run: ${summary.converted}`,
            `- Skipped (up-to-date): ${summary.skipped}`,
            `- No text extracted: ${summary.noText}`,
            `- Tasks: ${summary.tasksTotal} (${summary.tasksOpen} open, ${summary.tasksCompleted} completed)`,
        ];

        const errors = summaryErrors(summary);
        if (errors.length > 0) {
            lines.push('', '## Errors', ...errors.map(message => `- ${message}`));
        }

        await writeFileAtomic(path, lines.join('\n') + '\n');
        return path;
    }

    async loadReplacements(ctx: NoteContext): Promise<ReplacementMap> {
        const path = this.replacementsPath(ctx);
        if (!existsSync(path)) {
            return {};
        }
        try {
            return parseReplacementNote(await readFile(path, 'utf-8'));
        } catch (error) {
            ctx.logger.warn(`Failed to load replacements from ${path}: ${errorMessage(error)}`);
            return {};
        }
    }

    private replacementsPath(ctx: NoteContext): string {
        return join(ctx.vaultPath, ctx.reservedFolder, `Replacements - ${ctx.bridgeName}.md`);
    }

    private async ensureReplacementsTemplate(ctx: NoteContext): Promise<void> {
        const path = this.replacementsPath(ctx);
        if (existsSync(path)) {
            return;
        }

        const lines = [
            `# NoteBridge Replacements - ${ctx.bridgeName}`,
            '',
            '# Whole-word replacements applied to every converted note of this bridge.',
            '# One pair per line:',
            '#   wrong -> right',
            "# A leading '-', '*' or number is allowed. Lines starting with '#' are ignored.",
            '# Example:',
            '# - teh -> the',
            '',
        ];

        try {
            await writeFileAtomic(path, lines.join('\n'));
            ctx.logger.info(`Created replacements template at ${path}`);
        } catch (error) {
            ctx.logger.warn(`Failed to create replacements template at ${path}: ${errorMessage(error)}`);
        }
    }
}
