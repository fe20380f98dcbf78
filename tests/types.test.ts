import { describe, it, expect } from 'vitest';
import { AppConfigSchema, BridgeConfigSchema, TaskSyncStatusSchema } from '../src/types/index.js';

describe('Schema Tests', () => {
    describe('BridgeConfigSchema', () => {
        it('should apply defaults', () => {
            const bridge = BridgeConfigSchema.parse({ name: 'work', sourceSubdir: 'Note/Work', vaultPath: '/vaults/work' });

            expect(bridge.enabled).toBe(true);
            expect(bridge.tags).toEqual([]);
            expect(bridge.aggressiveCleanup).toBe(false);
            expect(bridge.exportImages).toBe(false);
            expect(bridge.imagesSubdir).toBe('NoteBridge/Assets');
        });

        it('should accept an absolute source path instead of a subdir', () => {
            const result = BridgeConfigSchema.safeParse({ name: 'home', sourcePath: '/notes/home', vaultPath: '/vaults/home' });

            expect(result.success).toBe(true);
        });

        it('should reject a bridge without any source', () => {
            const result = BridgeConfigSchema.safeParse({ name: 'work', vaultPath: '/vaults/work' });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].message).toBe("Bridge requires either 'sourceSubdir' or 'sourcePath'");
            }
        });

        it('should reject an empty name', () => {
            const result = BridgeConfigSchema.safeParse({ name: '', sourceSubdir: 'x', vaultPath: '/v' });

            expect(result.success).toBe(false);
        });
    });

    describe('AppConfigSchema', () => {
        it('should produce a complete default config from an empty object', () => {
            const config = AppConfigSchema.parse({});

            expect(config.notifyMode).toBe('errors');
            expect(config.providers).toEqual({ source: 'local', notes: 'obsidian', todo: 'noop', notifications: [] });
            expect(config.tool).toEqual({ command: 'supernote-tool', timeoutMs: 120_000 });
            expect(config.concurrency).toEqual({ bridges: 1, notes: 4 });
            expect(config.reservedFolder).toBe('NoteBridge');
            expect(config.historyLimit).toBe(100);
            expect(config.todoist.baseUrl).toBe('https://api.todoist.com');
            expect(config.bridges).toEqual([]);
        });

        it('should reject duplicate bridge names', () => {
            const result = AppConfigSchema.safeParse({
                bridges: [
                    { name: 'work', sourceSubdir: 'A', vaultPath: '/v1' },
                    { name: 'work', sourceSubdir: 'B', vaultPath: '/v2' },
                ],
            });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].path).toEqual(['bridges', 1, 'name']);
                expect(result.error.issues[0].message).toBe("Duplicate bridge name 'work'");
            }
        });

        it('should reject unknown provider kinds', () => {
            const result = AppConfigSchema.safeParse({ providers: { todo: 'trello' } });

            expect(result.success).toBe(false);
        });

        it('should reject a zero concurrency', () => {
            const result = AppConfigSchema.safeParse({ concurrency: { notes: 0 } });

            expect(result.success).toBe(false);
        });
    });

    describe('TaskSyncStatusSchema', () => {
        it('should accept the four statuses', () => {
            for (const status of ['pending', 'created', 'skipped', 'failed']) {
                expect(TaskSyncStatusSchema.safeParse(status).success).toBe(true);
            }
            expect(TaskSyncStatusSchema.safeParse('done').success).toBe(false);
        });
    });
});
