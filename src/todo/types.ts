import { LocalTask, TaskSyncResult } from '../types/index.js';
import { Logger } from '../utils/logger.js';

/**
 * Bridge a batch of tasks comes from
 */
export interface TodoContext {
    bridgeName: string;
    vaultName: string;
    vaultPath: string;
    buildNoteUrl: (notePath: string) => string;
    logger: Logger;
    signal?: AbortSignal;
}

/**
 * Todo provider interface. Per-task failures are reported in the results,
 * never thrown.
 */
export interface TodoProvider {
    readonly name: string;

    syncTasks(tasks: LocalTask[], ctx: TodoContext): Promise<TaskSyncResult[]>;
}
