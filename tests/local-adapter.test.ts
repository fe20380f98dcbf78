import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DropboxAdapter, LocalAdapter } from '../src/adapters/local.js';
import { NoopAdapter } from '../src/adapters/noop.js';
import { parseIgnoreFile, shouldIgnore, DEFAULT_IGNORE_PATTERNS } from '../src/utils/ignore.js';

const TEST_DIR = join(process.cwd(), 'tests', 'tmp', 'local-adapter');
const ROOT = join(TEST_DIR, 'notes');

function touch(relativePath: string): void {
    const path = join(ROOT, relativePath);
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, 'note');
}

describe('LocalAdapter Tests', () => {
    beforeEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
        mkdirSync(ROOT, { recursive: true });
    });

    afterEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
    });

    it('should resolve the bridge root', () => {
        const adapter = new LocalAdapter('/srv/notes');

        expect(adapter.getRoot({ bridgeName: 'work', sourceSubdir: 'Note/Work' })).toBe(join('/srv/notes', 'Note/Work'));
        expect(adapter.getRoot({ bridgeName: 'work', sourcePath: '/elsewhere', sourceSubdir: 'x' })).toBe('/elsewhere');
        expect(new LocalAdapter().getRoot({ bridgeName: 'work', sourceSubdir: 'x' })).toBeNull();
    });

    it('should find note files recursively in sorted order', async () => {
        touch('Work/b.note');
        touch('Work/Meetings/a.note');
        touch('Work/readme.txt');
        touch('Work/UPPER.NOTE');

        const notes = await new LocalAdapter(ROOT).scan({ bridgeName: 'work', sourceSubdir: 'Work' });

        expect(notes.map(entry => entry.relativePath)).toEqual(['Meetings/a.note', 'UPPER.NOTE', 'b.note']);
        expect(notes[0].bridgeName).toBe('work');
        expect(notes[0].absolutePath).toBe(join(ROOT, 'Work', 'Meetings', 'a.note'));
        expect(notes[0].size).toBe(4);
    });

    it('should skip hidden directories and ignored paths', async () => {
        touch('Work/.trash/old.note');
        touch('Work/.cache/x.note');
        touch('Work/Archive/2019.note');
        touch('Work/keep.note');
        writeFileSync(join(ROOT, 'Work', '.notebridgeignore'), '# archived\nArchive/\n');

        const notes = await new LocalAdapter(ROOT).scan({ bridgeName: 'work', sourceSubdir: 'Work' });

        expect(notes.map(entry => entry.relativePath)).toEqual(['keep.note']);
    });

    it('should return nothing for a missing root', async () => {
        const notes = await new LocalAdapter(ROOT).scan({ bridgeName: 'work', sourceSubdir: 'Missing' });

        expect(notes).toEqual([]);
    });

    it('should scan dropbox folders like local ones', async () => {
        touch('Work/a.note');
        const adapter = new DropboxAdapter(ROOT);

        expect(adapter.type).toBe('dropbox');
        expect((await adapter.scan({ bridgeName: 'work', sourceSubdir: 'Work' })).map(entry => entry.relativePath)).toEqual(['a.note']);
    });

    it('should have no root for the noop adapter', async () => {
        const adapter = new NoopAdapter();

        expect(adapter.getRoot()).toBeNull();
        expect(await adapter.scan()).toEqual([]);
    });
});

describe('Ignore Pattern Tests', () => {
    it('should parse patterns and drop comments', () => {
        expect(parseIgnoreFile('# comment\n\n*.tmp\n  Archive/  \n!keep.note\n')).toEqual(['*.tmp', 'Archive/', '!keep.note']);
    });

    it('should match globs against the file name', () => {
        expect(shouldIgnore('Work/draft.tmp', DEFAULT_IGNORE_PATTERNS)).toBe(true);
        expect(shouldIgnore('Work/draft.note', DEFAULT_IGNORE_PATTERNS)).toBe(false);
    });

    it('should match directory patterns at any depth', () => {
        expect(shouldIgnore('.trash/a.note', DEFAULT_IGNORE_PATTERNS)).toBe(true);
        expect(shouldIgnore('Work/.git/config', DEFAULT_IGNORE_PATTERNS)).toBe(true);
    });

    it('should honor negation', () => {
        expect(shouldIgnore('keep.note', ['*.note', '!keep.note'])).toBe(false);
        expect(shouldIgnore('drop.note', ['*.note', '!keep.note'])).toBe(true);
    });
});
