import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { ExtractionError, TextExtractor, ToolRunner } from '../src/processors/extractor.js';

const TEST_DIR = join(process.cwd(), 'tests', 'tmp', 'extractor');
const NOTE_PATH = join(TEST_DIR, 'standup.note');

function writesOutput(text: string | null, code: number = 0): ToolRunner {
    return async (_command, args) => {
        if (text !== null) {
            writeFileSync(args[5], text);
        }
        return { code, signal: null, stdout: '', stderr: '' };
    };
}

async function extractionFailure(extractor: TextExtractor): Promise<ExtractionError> {
    try {
        await extractor.extractText(NOTE_PATH);
    } catch (error) {
        if (error instanceof ExtractionError) return error;
        throw error;
    }
    throw new Error('expected extraction to fail');
}

describe('TextExtractor Tests', () => {
    beforeEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
        mkdirSync(TEST_DIR, { recursive: true });
    });

    afterEach(() => {
        if (existsSync(TEST_DIR)) {
            rmSync(TEST_DIR, { recursive: true });
        }
    });

    describe('extractText', () => {
        it('should return the trimmed tool output', async () => {
            const runner = vi.fn<ToolRunner>(writesOutput('\n  hello world \n'));
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });

            const text = await extractor.extractText(NOTE_PATH);

            expect(text).toBe('hello world');
            expect(runner).toHaveBeenCalledTimes(1);
            const [command, args, options] = runner.mock.calls[0];
            expect(command).toBe('recognizer');
            expect(args.slice(0, 5)).toEqual(['convert', '-t', 'txt', '-a', NOTE_PATH]);
            expect(options.timeoutMs).toBe(1000);
        });

        it('should return null for whitespace-only output', async () => {
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner: writesOutput('  \n ') });

            expect(await extractor.extractText(NOTE_PATH)).toBeNull();
        });

        it('should return null when the tool writes no file', async () => {
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner: writesOutput(null) });

            expect(await extractor.extractText(NOTE_PATH)).toBeNull();
        });

        it('should remove its work directory', async () => {
            let outPath = '';
            const runner: ToolRunner = async (command, args, options) => {
                outPath = args[5];
                return writesOutput('text')(command, args, options);
            };
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });

            await extractor.extractText(NOTE_PATH);

            expect(outPath).not.toBe('');
            expect(existsSync(dirname(outPath))).toBe(false);
        });

        it('should report a missing tool', async () => {
            const runner: ToolRunner = async () => {
                throw Object.assign(new Error('spawn recognizer ENOENT'), { code: 'ENOENT' });
            };
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });

            const error = await extractionFailure(extractor);

            expect(error.kind).toBe('tool_missing');
            expect(error.message).toBe(`recognizer not found on PATH; cannot convert ${NOTE_PATH}`);
        });

        it('should report a non-zero exit with stderr', async () => {
            const runner: ToolRunner = async () => ({ code: 2, signal: null, stdout: '', stderr: 'bad file\n' });
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });

            const error = await extractionFailure(extractor);

            expect(error.kind).toBe('tool_failed');
            expect(error.message).toBe(`recognizer failed for ${NOTE_PATH}: bad file`);
        });

        it('should report a killed tool as a timeout', async () => {
            const runner: ToolRunner = async () => ({ code: null, signal: 'SIGKILL', stdout: '', stderr: '' });
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 50, runner });

            const error = await extractionFailure(extractor);

            expect(error.message).toBe(`recognizer failed for ${NOTE_PATH}: killed by SIGKILL (timeout 50ms)`);
        });

        it('should rethrow a cancellation', async () => {
            const runner: ToolRunner = async () => {
                const error = new Error('The operation was aborted');
                error.name = 'AbortError';
                throw error;
            };
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });

            await expect(extractor.extractText(NOTE_PATH)).rejects.toThrow('The operation was aborted');
        });

        it('should detect a missing executable when spawning', async () => {
            const extractor = new TextExtractor({ command: 'notebridge-test-no-such-tool', timeoutMs: 5000 });

            const error = await extractionFailure(extractor);

            expect(error.kind).toBe('tool_missing');
        });

        it('should detect a failing executable when spawning', async () => {
            // Node exits non-zero for a script path that does not exist
            const extractor = new TextExtractor({ command: process.execPath, timeoutMs: 5000 });

            const error = await extractionFailure(extractor);

            expect(error.kind).toBe('tool_failed');
        });
    });

    describe('exportImages', () => {
        it('should return exported pages in page order', async () => {
            const runner: ToolRunner = async (_command, args) => {
                const dir = dirname(args[5]);
                for (const page of [1, 10, 2]) {
                    writeFileSync(join(dir, `standup-${page}.png`), 'png');
                }
                return { code: 0, signal: null, stdout: '', stderr: '' };
            };
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });
            const outDir = join(TEST_DIR, 'assets', 'standup');

            const images = await extractor.exportImages(NOTE_PATH, outDir);

            expect(images).toEqual([
                join(outDir, 'standup-1.png'),
                join(outDir, 'standup-2.png'),
                join(outDir, 'standup-10.png'),
            ]);
        });

        it('should drop pages left over from an earlier export', async () => {
            const outDir = join(TEST_DIR, 'assets', 'standup');
            mkdirSync(outDir, { recursive: true });
            writeFileSync(join(outDir, 'standup-3.png'), 'old page');
            writeFileSync(join(outDir, 'cover.png'), 'unrelated');
            const runner: ToolRunner = async (_command, args) => {
                const dir = dirname(args[5]);
                for (const page of [1, 2]) {
                    writeFileSync(join(dir, `standup-${page}.png`), 'png');
                }
                return { code: 0, signal: null, stdout: '', stderr: '' };
            };
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });

            const images = await extractor.exportImages(NOTE_PATH, outDir);

            expect(images).toEqual([join(outDir, 'standup-1.png'), join(outDir, 'standup-2.png')]);
            expect(existsSync(join(outDir, 'standup-3.png'))).toBe(false);
            expect(existsSync(join(outDir, 'cover.png'))).toBe(true);
        });

        it('should pass png mode and the stem as output name', async () => {
            const runner = vi.fn<ToolRunner>(writesOutput(null));
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });
            const outDir = join(TEST_DIR, 'assets');

            await extractor.exportImages(NOTE_PATH, outDir);

            expect(runner.mock.calls[0][1]).toEqual(['convert', '-t', 'png', '-a', NOTE_PATH, join(outDir, 'standup.png')]);
        });

        it('should return an empty list when export fails', async () => {
            const runner: ToolRunner = async () => ({ code: 1, signal: null, stdout: 'no pages', stderr: '' });
            const extractor = new TextExtractor({ command: 'recognizer', timeoutMs: 1000, runner });

            expect(await extractor.exportImages(NOTE_PATH, join(TEST_DIR, 'assets'))).toEqual([]);
        });
    });
});
