import { TodoistApi } from '@doist/todoist-api-typescript';
import type { AddTaskArgs } from '@doist/todoist-api-typescript';
import { LocalTask, TaskSyncResult } from '../types/index.js';
import { computeRequestId } from '../utils/hash.js';
import { errorMessage } from '../utils/errors.js';
import { RequestTimeoutError } from '../utils/http.js';
import { TodoContext, TodoProvider } from './types.js';

/**
 * The part of TodoistApi the provider calls
 */
export interface TodoistTaskClient {
    addTask(args: AddTaskArgs, requestId?: string): Promise<{ id: string }>;
}

export interface TodoistOptions {
    apiToken?: string;
    baseUrl?: string;       // API domain; the client appends its REST path
    timeoutMs: number;
    client?: TodoistTaskClient;
}

/**
 * Creates one Todoist task per local task
 */
export class TodoistProvider implements TodoProvider {
    readonly name = 'todoist';

    constructor(private options: TodoistOptions) { }

    async syncTasks(tasks: LocalTask[], ctx: TodoContext): Promise<TaskSyncResult[]> {
        const token = this.options.apiToken?.trim();
        if (!token) {
            return tasks.map(task => this.result(task, null, 'failed', 'Todoist API token is not set'));
        }

        const baseUrl = this.options.baseUrl?.trim() || undefined;
        const client = this.options.client ?? new TodoistApi(token, baseUrl);

        const results: TaskSyncResult[] = [];
        for (const task of tasks) {
            if (ctx.signal?.aborted) {
                break;
            }
            results.push(await this.createTask(client, task, ctx));
        }
        return results;
    }

    private async createTask(client: TodoistTaskClient, task: LocalTask, ctx: TodoContext): Promise<TaskSyncResult> {
        const args: AddTaskArgs = {
            content: task.title,
            description: this.buildDescription(task, ctx),
            labels: ['notebridge', `vault:${ctx.vaultName}`],
        };

        try {
            // The request id lets the service drop a repeat of a create it already applied
            const created = await this.withTimeout(client.addTask(args, computeRequestId(task.localId, this.name)));
            ctx.logger.debug(`Created Todoist task ${created.id} for ${task.localId}`);
            return this.result(task, created.id, 'created', null);
        } catch (error) {
            return this.result(task, null, 'failed', `Request failed: ${errorMessage(error)}`);
        }
    }

    private async withTimeout<T>(work: Promise<T>): Promise<T> {
        const { timeoutMs } = this.options;
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_resolve, reject) => {
            timer = setTimeout(() => reject(new RequestTimeoutError(timeoutMs)), timeoutMs);
        });

        try {
            return await Promise.race([work, timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    private buildDescription(task: LocalTask, ctx: TodoContext): string {
        return [
            'From NoteBridge',
            '',
            `Vault: ${ctx.vaultName}`,
            `Note: ${task.notePath}`,
            `Line: ${task.lineNo}`,
            `Local ID: ${task.localId}`,
            '',
            `Note URL: ${ctx.buildNoteUrl(task.notePath)}`,
        ].join('\n');
    }

    private result(
        task: LocalTask,
        externalId: string | null,
        status: TaskSyncResult['status'],
        error: string | null
    ): TaskSyncResult {
        return { localId: task.localId, provider: this.name, externalId, status, error };
    }
}
