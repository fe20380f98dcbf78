import { spawn } from 'child_process';
import { mkdir, mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, extname, join } from 'path';
import { Logger, silentLogger } from '../utils/logger.js';
import { errorMessage, isAbortError } from '../utils/errors.js';
import { hasErrorCode } from '../utils/fs.js';

export type ExtractionFailure = 'tool_missing' | 'tool_failed';

/**
 * A failed tool invocation, by kind
 */
export class ExtractionError extends Error {
    constructor(public readonly kind: ExtractionFailure, message: string) {
        super(message);
        this.name = 'ExtractionError';
    }
}

export interface ToolResult {
    code: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
}

export interface ToolRunOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * Runs the external tool. Rejects when it cannot be started.
 */
export type ToolRunner = (command: string, args: string[], options: ToolRunOptions) => Promise<ToolResult>;

/**
 * Run a process to completion, killing it on timeout or abort
 */
export const spawnTool: ToolRunner = (command, args, options) =>
    new Promise((resolve, reject) => {
        const child = spawn(command, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
            timeout: options.timeoutMs,
            killSignal: 'SIGKILL',
            signal: options.signal,
        });

        let stdout = '';
        let stderr = '';
        child.stdout.setEncoding('utf-8');
        child.stderr.setEncoding('utf-8');
        child.stdout.on('data', (chunk: string) => {
            stdout += chunk;
        });
        child.stderr.on('data', (chunk: string) => {
            stderr += chunk;
        });

        child.on('error', reject);
        child.on('close', (code, signal) => resolve({ code, signal, stdout, stderr }));
    });

export interface ExtractorOptions {
    command: string;
    timeoutMs: number;
    runner?: ToolRunner;
}

export interface ExtractContext {
    signal?: AbortSignal;
    logger?: Logger;
}

/**
 * Wraps the recognition tool: text extraction and page image export
 */
export class TextExtractor {
    private runner: ToolRunner;

    constructor(private options: ExtractorOptions) {
        this.runner = options.runner ?? spawnTool;
    }

    /**
     * Recognized text of a note, trimmed, or null when there is none
     *
     * @throws ExtractionError when the tool is missing or fails
     */
    async extractText(notePath: string, ctx: ExtractContext = {}): Promise<string | null> {
        const workDir = await mkdtemp(join(tmpdir(), 'notebridge-'));
        const outPath = join(workDir, 'out.txt');

        try {
            await this.convert('txt', notePath, outPath, ctx.signal);

            let text = '';
            try {
                text = await readFile(outPath, 'utf-8');
            } catch (error) {
                if (!hasErrorCode(error, 'ENOENT')) throw error;
            }
            return text.trim() || null;
        } finally {
            await rm(workDir, { recursive: true, force: true });
        }
    }

    /**
     * Export every page as PNG into `outDir`. Returns the image paths in page
     * order; failures are logged and give an empty list.
     */
    async exportImages(notePath: string, outDir: string, ctx: ExtractContext = {}): Promise<string[]> {
        const logger = ctx.logger ?? silentLogger;
        const stem = basename(notePath, extname(notePath));

        try {
            await mkdir(outDir, { recursive: true });
            // Pages of an earlier, longer export must not linger
            for (const name of await readdir(outDir)) {
                if (isPageImage(name, stem)) {
                    await rm(join(outDir, name), { force: true });
                }
            }
            // The tool writes <stem>-1.png, <stem>-2.png, ... next to the given name
            await this.convert('png', notePath, join(outDir, `${stem}.png`), ctx.signal);
        } catch (error) {
            if (isAbortError(error)) throw error;
            logger.error(`Image export failed for ${notePath}: ${errorMessage(error)}`);
            return [];
        }

        const pngs = (await readdir(outDir))
            .filter(name => isPageImage(name, stem))
            .sort((a, b) => a.localeCompare(b, 'en', { numeric: true }))
            .map(name => join(outDir, name));

        if (pngs.length === 0) {
            logger.warn(`No page images exported for ${notePath}`);
        } else {
            logger.info(`Exported ${pngs.length} page image(s) for ${notePath}`);
        }
        return pngs;
    }

    private async convert(type: 'txt' | 'png', notePath: string, outPath: string, signal?: AbortSignal): Promise<void> {
        const { command, timeoutMs } = this.options;

        let result: ToolResult;
        try {
            result = await this.runner(command, ['convert', '-t', type, '-a', notePath, outPath], { timeoutMs, signal });
        } catch (error) {
            if (isAbortError(error)) throw error;
            if (hasErrorCode(error, 'ENOENT')) {
                throw new ExtractionError('tool_missing', `${command} not found on PATH; cannot convert ${notePath}`);
            }
            throw new ExtractionError('tool_failed', errorMessage(error));
        }

        if (result.code === 0) {
            return;
        }

        signal?.throwIfAborted();

        const detail = result.stderr.trim()
            || result.stdout.trim()
            || (result.signal ? `killed by ${result.signal} (timeout ${timeoutMs}ms)` : `exited with code ${result.code}`);
        throw new ExtractionError('tool_failed', `${command} failed for ${notePath}: ${detail}`);
    }
}

/**
 * <stem>.png or <stem>-<page>.png
 */
function isPageImage(name: string, stem: string): boolean {
    if (!name.startsWith(stem)) {
        return false;
    }
    return /^(?:-\d+)?\.png$/i.test(name.slice(stem.length));
}
