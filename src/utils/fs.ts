import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import { randomBytes } from 'crypto';
import { dirname } from 'path';

/**
 * Write a file through a sibling temp file and a rename, so readers and
 * interrupted runs never see a partial file
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tmpPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
    try {
        await writeFile(tmpPath, content, 'utf-8');
        await rename(tmpPath, path);
    } catch (error) {
        await rm(tmpPath, { force: true });
        throw error;
    }
}

/**
 * mtime of a path in milliseconds, or null when it does not exist
 */
export async function modifiedTime(path: string): Promise<number | null> {
    try {
        return (await stat(path)).mtimeMs;
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
            return null;
        }
        throw error;
    }
}

/**
 * Whether a path exists and is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
    try {
        return (await stat(path)).isDirectory();
    } catch {
        return false;
    }
}

export function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}
