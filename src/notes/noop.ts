import { join } from 'path';
import { ReplacementMap } from '../processors/replacements.js';
import { NoteContext, NoteProvider } from './types.js';

/**
 * Note provider that writes nothing
 */
export class NoopNoteProvider implements NoteProvider {
    readonly type = 'noop';

    async writeNote(_content: string, _metadata: unknown, relativePath: string, ctx: NoteContext): Promise<string> {
        return join(ctx.vaultPath, relativePath);
    }

    buildNoteUrl(relativePath: string): string {
        return relativePath;
    }

    async getNoteModifiedTime(): Promise<number | null> {
        return null;
    }

    async writeStatusNote(): Promise<string | null> {
        return null;
    }

    async loadReplacements(): Promise<ReplacementMap> {
        return {};
    }
}
