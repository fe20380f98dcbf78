import { LocalTask, TaskSyncResult } from '../types/index.js';
import { TodoContext, TodoProvider } from '../todo/types.js';
import { errorMessage } from '../utils/errors.js';
import { TaskRegistry } from './task-registry.js';

export interface TaskSyncReport {
    provider: string;
    submitted: number;
    created: number;
    skipped: number;
    failed: number;
}

/**
 * Sends a bridge's pending tasks to the todo provider and records each outcome
 */
export class SyncCoordinator {
    constructor(
        private registry: TaskRegistry,
        private provider: TodoProvider
    ) { }

    async sync(ctx: TodoContext): Promise<TaskSyncReport> {
        const report: TaskSyncReport = { provider: this.provider.name, submitted: 0, created: 0, skipped: 0, failed: 0 };

        this.registry.skipCompleted(this.provider.name, ctx.bridgeName);

        const pending = this.registry.pendingForProvider(this.provider.name, ctx.bridgeName);
        if (pending.length === 0) {
            return report;
        }
        report.submitted = pending.length;
        ctx.logger.debug(`Submitting ${pending.length} task(s) to ${this.provider.name}`);

        let results: TaskSyncResult[];
        try {
            results = await this.provider.syncTasks(pending, ctx);
        } catch (error) {
            // A cancelled run records nothing; the next run resumes from the registry
            ctx.signal?.throwIfAborted();
            const message = errorMessage(error);
            ctx.logger.error(`Todo provider ${this.provider.name} failed: ${message}`);
            results = pending.map(task => this.failed(task, message));
        }

        // After a cancel, only tasks the provider answered for are recorded
        const answered = ctx.signal?.aborted
            ? pending.filter(task => results.some(result => result.localId === task.localId))
            : pending;
        const outcomes = this.matchResults(answered, results);
        this.registry.recordResults(outcomes);

        for (const outcome of outcomes) {
            if (outcome.status === 'created') report.created++;
            else if (outcome.status === 'skipped') report.skipped++;
            else if (outcome.status === 'failed') report.failed++;
        }
        if (report.failed > 0) {
            ctx.logger.warn(`${report.failed} task(s) failed to sync to ${this.provider.name}; will retry next run`);
        }
        return report;
    }

    /**
     * One outcome per submitted task; a task the provider did not answer for
     * fails, and unknown ids are dropped
     */
    private matchResults(pending: LocalTask[], results: TaskSyncResult[]): TaskSyncResult[] {
        const byId = new Map(results.map(result => [result.localId, result]));
        return pending.map(task => {
            const result = byId.get(task.localId);
            if (!result) {
                return this.failed(task, 'No result returned by provider');
            }
            return { ...result, provider: this.provider.name };
        });
    }

    private failed(task: LocalTask, error: string): TaskSyncResult {
        return { localId: task.localId, provider: this.provider.name, externalId: null, status: 'failed', error };
    }
}
