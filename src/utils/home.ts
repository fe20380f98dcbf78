import { constants } from 'fs';
import { access, mkdir, stat } from 'fs/promises';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { errorMessage } from './errors.js';

/**
 * NOTEBRIDGE_HOME is unusable
 */
export class HomeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'HomeError';
    }
}

/**
 * Where notebridge keeps its state
 */
export interface HomePaths {
    root: string;
    database: string;
    config: string;
}

/**
 * NOTEBRIDGE_HOME when set, ~/.notebridge otherwise
 */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): HomePaths {
    const root = env.NOTEBRIDGE_HOME
        ? resolve(expandHome(env.NOTEBRIDGE_HOME))
        : join(homedir(), '.notebridge');
    return {
        root,
        database: join(root, 'notebridge.db'),
        config: join(root, 'config.yaml'),
    };
}

/**
 * Create the home directory if needed and check that files can be written in it
 */
export async function ensureHome(root: string): Promise<void> {
    try {
        await mkdir(root, { recursive: true });
    } catch (error) {
        throw new HomeError(`Cannot create ${root}: ${errorMessage(error)}`);
    }

    if (!(await stat(root)).isDirectory()) {
        throw new HomeError(`${root} is not a directory`);
    }

    try {
        await access(root, constants.W_OK | constants.X_OK);
    } catch {
        throw new HomeError(`${root} is not writable`);
    }
}

/**
 * Expand a leading ~ to the user's home directory
 */
export function expandHome(path: string): string {
    if (path === '~') {
        return homedir();
    }
    if (path.startsWith('~/')) {
        return join(homedir(), path.slice(2));
    }
    return path;
}
