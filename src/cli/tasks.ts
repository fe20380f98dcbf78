import { TaskRegistry } from '../core/task-registry.js';
import { loadConfig, openDatabase } from './shared.js';

export interface TasksOptions {
    bridge?: string;
    provider?: string;
    pending?: boolean;
    config?: string;
}

export async function listTasks(options: TasksOptions): Promise<void> {
    const provider = options.provider ?? loadConfig(options.config).getConfig().providers.todo;
    const db = await openDatabase();
    const registry = new TaskRegistry(db);

    const listing = registry.list(provider, options.bridge).filter(({ task, record }) =>
        !options.pending || (!task.completed && (!record || record.status === 'pending' || record.status === 'failed'))
    );

    if (listing.length === 0) {
        console.log(options.pending ? 'No pending tasks' : 'No tasks recorded');
        db.close();
        return;
    }

    for (const { task, record } of listing) {
        const box = task.completed ? '[x]' : '[ ]';
        const state = record ? record.status : 'unsynced';
        const external = record?.externalId ? ` -> ${record.externalId}` : '';
        console.log(`${box} ${task.title}`);
        console.log(`    ${task.localId}  ${provider}: ${state}${external}`);
        if (record?.error) {
            console.log(`    error: ${record.error}`);
        }
    }

    db.close();
}
