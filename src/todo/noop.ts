import { LocalTask, TaskSyncResult } from '../types/index.js';
import { TodoProvider } from './types.js';

/**
 * Default provider: every task is recorded as skipped, nothing is sent
 */
export class NoopTodoProvider implements TodoProvider {
    readonly name = 'noop';

    async syncTasks(tasks: LocalTask[]): Promise<TaskSyncResult[]> {
        return tasks.map((task): TaskSyncResult => ({
            localId: task.localId,
            provider: this.name,
            externalId: null,
            status: 'skipped',
            error: null,
        }));
    }
}
