import { z } from 'zod';

// Provider kinds
export const SourceProviderKindSchema = z.enum(['local', 'dropbox', 'noop']);
export const NoteProviderKindSchema = z.enum(['obsidian', 'markdown', 'noop']);
export const TodoProviderKindSchema = z.enum(['noop', 'todoist']);
export const NotificationProviderKindSchema = z.enum(['webhook', 'noop']);

export type SourceProviderKind = z.infer<typeof SourceProviderKindSchema>;
export type NoteProviderKind = z.infer<typeof NoteProviderKindSchema>;
export type TodoProviderKind = z.infer<typeof TodoProviderKindSchema>;
export type NotificationProviderKind = z.infer<typeof NotificationProviderKindSchema>;

// Notification policy
export const NotifyModeSchema = z.enum(['all', 'errors', 'none']);

export type NotifyMode = z.infer<typeof NotifyModeSchema>;

// Sync state of one task for one provider
export const TaskSyncStatusSchema = z.enum(['pending', 'created', 'skipped', 'failed']);

export type TaskSyncStatus = z.infer<typeof TaskSyncStatusSchema>;

// Bridge configuration
export const BridgeConfigSchema = z
    .object({
        name: z.string().min(1),
        enabled: z.boolean().default(true),
        sourceSubdir: z.string().optional(),
        sourcePath: z.string().optional(),
        vaultPath: z.string().min(1),
        tags: z.array(z.string()).default([]),
        aggressiveCleanup: z.boolean().default(false),
        exportImages: z.boolean().default(false),
        imagesSubdir: z.string().default('NoteBridge/Assets'),
    })
    .refine(bridge => Boolean(bridge.sourceSubdir || bridge.sourcePath), {
        message: "Bridge requires either 'sourceSubdir' or 'sourcePath'",
    });

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

export const AppConfigSchema = z
    .object({
        version: z.string().default('0.1'),
        sourceRoot: z.string().optional(),
        defaultTags: z.array(z.string()).default([]),
        notifyMode: NotifyModeSchema.default('errors'),
        providers: z
            .object({
                source: SourceProviderKindSchema.default('local'),
                notes: NoteProviderKindSchema.default('obsidian'),
                todo: TodoProviderKindSchema.default('noop'),
                notifications: z.array(NotificationProviderKindSchema).default([]),
            })
            .default({}),
        tool: z
            .object({
                command: z.string().min(1).default('supernote-tool'),
                timeoutMs: z.number().int().positive().default(120_000),
            })
            .default({}),
        concurrency: z
            .object({
                bridges: z.number().int().min(1).default(1),
                notes: z.number().int().min(1).default(4),
            })
            .default({}),
        reservedFolder: z.string().min(1).default('NoteBridge'),
        historyLimit: z.number().int().min(1).default(100),
        webhook: z
            .object({
                url: z.string().optional(),
                topic: z.string().optional(),
                timeoutMs: z.number().int().positive().default(5_000),
            })
            .default({}),
        todoist: z
            .object({
                apiToken: z.string().optional(),
                baseUrl: z.string().default('https://api.todoist.com'),
                timeoutMs: z.number().int().positive().default(10_000),
            })
            .default({}),
        healthcheckUrl: z.string().optional(),
        bridges: z.array(BridgeConfigSchema).default([]),
    })
    .superRefine((config, ctx) => {
        const seen = new Set<string>();
        config.bridges.forEach((bridge, index) => {
            if (seen.has(bridge.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['bridges', index, 'name'],
                    message: `Duplicate bridge name '${bridge.name}'`,
                });
            }
            seen.add(bridge.name);
        });
    });

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * One recognized note file found under a bridge's source subtree
 */
export interface SourceNote {
    bridgeName: string;
    absolutePath: string;
    relativePath: string;   // posix-style, relative to the bridge source root
    mtimeMs: number;
    size: number;
}

/**
 * A checkbox line extracted from converted Markdown
 */
export interface LocalTask {
    localId: string;        // "<bridge>:<note.md>:<line>"
    bridgeName: string;
    vaultName: string;
    notePath: string;       // posix-style, relative to the vault root
    lineNo: number;         // 1-based, in the transformed body
    title: string;
    completed: boolean;
}

/**
 * Outcome of one provider attempt for one task
 */
export interface TaskSyncResult {
    localId: string;
    provider: string;
    externalId: string | null;
    status: TaskSyncStatus;
    error: string | null;
}

/**
 * Persisted sync state of a task for a provider
 */
export interface TaskSyncRecord extends TaskSyncResult {
    lastAttemptedAt: string;
}

/**
 * Counters and structural flags for one bridge run
 */
export interface BridgeRunSummary {
    bridgeName: string;
    vaultName: string;
    timestamp: string;
    notesFound: number;
    converted: number;
    skipped: number;
    noText: number;
    toolMissing: number;
    toolFailed: number;
    tasksTotal: number;
    tasksOpen: number;
    tasksCompleted: number;
    sourceMissing: boolean;
    vaultMissing: boolean;
}

export type BridgeHealth = 'success' | 'warning' | 'error';

/**
 * Flat notification body sent to notification providers
 */
export interface NotificationPayload {
    bridge: string;
    timestamp: string;
    notes_found: number;
    converted: number;
    skipped: number;
    no_text: number;
    tool_missing: number;
    tool_failed: number;
    supernote_missing: boolean;
    vault_missing: boolean;
}

/**
 * Lifecycle of a single bridge run
 */
export type BridgeRunPhase =
    | 'init'
    | 'validating'
    | 'aborted'
    | 'scanning'
    | 'converting'
    | 'task-syncing'
    | 'reporting'
    | 'done';

/**
 * Per-note outcome reported by the note pipeline
 */
export type NoteOutcome = 'converted' | 'skipped' | 'no_text' | 'tool_missing' | 'tool_failed';
