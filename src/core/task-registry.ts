import { NoteBridgeDatabase, TaskCounts, TaskListing } from '../storage/database.js';
import { LocalTask, TaskSyncRecord, TaskSyncResult } from '../types/index.js';

/**
 * Durable record of extracted tasks and their sync state per provider.
 *
 * Tasks are insert-if-absent: a known id is never overwritten, except that
 * a task seen completed stays completed. A record that reached 'created'
 * is final.
 */
export class TaskRegistry {
    constructor(
        private db: NoteBridgeDatabase,
        private now: () => Date = () => new Date()
    ) { }

    /**
     * Returns the number of tasks seen for the first time
     */
    upsertTasks(tasks: LocalTask[]): number {
        if (tasks.length === 0) {
            return 0;
        }
        return this.db.upsertTasks(tasks, this.timestamp());
    }

    /**
     * Open tasks eligible for (re)submission to a provider
     */
    pendingForProvider(provider: string, bridgeName?: string): LocalTask[] {
        return this.db.getPendingTasks(provider, bridgeName);
    }

    /**
     * Returns false when the record was already 'created' and left alone
     */
    recordResult(result: TaskSyncResult): boolean {
        return this.db.upsertSyncRecord(result, this.timestamp());
    }

    /**
     * Record a batch in one transaction
     */
    recordResults(results: TaskSyncResult[]): number {
        return this.db.upsertSyncRecords(results, this.timestamp());
    }

    /**
     * Completed tasks are recorded as skipped for the provider and never sent
     */
    skipCompleted(provider: string, bridgeName: string): number {
        return this.db.markCompletedSkipped(provider, bridgeName, this.timestamp());
    }

    getTask(localId: string): LocalTask | null {
        return this.db.getTask(localId);
    }

    getRecord(localId: string, provider: string): TaskSyncRecord | null {
        return this.db.getSyncRecord(localId, provider);
    }

    counts(bridgeName: string): TaskCounts {
        return this.db.getTaskCounts(bridgeName);
    }

    list(provider: string, bridgeName?: string): TaskListing[] {
        return this.db.listTasks(provider, bridgeName);
    }

    private timestamp(): string {
        return this.now().toISOString();
    }
}
