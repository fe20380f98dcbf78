import { AppConfig, NoteProviderKind, NotificationProviderKind, SourceProviderKind, TodoProviderKind } from '../types/index.js';
import { SourceAdapter } from '../adapters/types.js';
import { DropboxAdapter, LocalAdapter } from '../adapters/local.js';
import { NoopAdapter } from '../adapters/noop.js';
import { NoteProvider } from '../notes/types.js';
import { ObsidianNoteProvider } from '../notes/obsidian.js';
import { MarkdownNoteProvider } from '../notes/markdown.js';
import { NoopNoteProvider } from '../notes/noop.js';
import { TodoProvider } from '../todo/types.js';
import { NoopTodoProvider } from '../todo/noop.js';
import { TodoistProvider, TodoistTaskClient } from '../todo/todoist.js';
import { NotificationProvider } from '../notifications/types.js';
import { WebhookNotificationProvider } from '../notifications/webhook.js';
import { NoopNotificationProvider } from '../notifications/noop.js';
import { FetchFn } from '../utils/http.js';

/**
 * The providers a run works with
 */
export interface ProviderSet {
    source: SourceAdapter;
    notes: NoteProvider;
    todo: TodoProvider;
    notifiers: NotificationProvider[];
}

/**
 * Clients the providers talk through; real ones are built when absent
 */
export interface ProviderClients {
    fetch?: FetchFn;
    todoist?: TodoistTaskClient;
}

/**
 * Builds providers from configuration
 */
export class ProviderManager {
    constructor(
        private config: AppConfig,
        private clients: ProviderClients = {}
    ) { }

    createAll(): ProviderSet {
        const { providers } = this.config;
        return {
            source: this.createSource(providers.source),
            notes: this.createNotes(providers.notes),
            todo: this.createTodo(providers.todo),
            notifiers: [...new Set(providers.notifications)].map(kind => this.createNotifier(kind)),
        };
    }

    createSource(kind: SourceProviderKind): SourceAdapter {
        switch (kind) {
            case 'local':
                return new LocalAdapter(this.config.sourceRoot);
            case 'dropbox':
                return new DropboxAdapter(this.config.sourceRoot);
            case 'noop':
                return new NoopAdapter();
        }
    }

    createNotes(kind: NoteProviderKind): NoteProvider {
        switch (kind) {
            case 'obsidian':
                return new ObsidianNoteProvider();
            case 'markdown':
                return new MarkdownNoteProvider();
            case 'noop':
                return new NoopNoteProvider();
        }
    }

    createTodo(kind: TodoProviderKind): TodoProvider {
        switch (kind) {
            case 'noop':
                return new NoopTodoProvider();
            case 'todoist':
                return new TodoistProvider({ ...this.config.todoist, client: this.clients.todoist });
        }
    }

    createNotifier(kind: NotificationProviderKind): NotificationProvider {
        switch (kind) {
            case 'webhook':
                return new WebhookNotificationProvider({ ...this.config.webhook, fetch: this.clients.fetch });
            case 'noop':
                return new NoopNotificationProvider();
        }
    }
}
