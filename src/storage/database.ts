import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { BridgeHealth, BridgeRunSummary, LocalTask, TaskSyncRecord, TaskSyncResult, TaskSyncStatus } from '../types/index.js';

interface TaskRow {
    local_id: string;
    bridge_name: string;
    vault_name: string;
    note_path: string;
    line_no: number;
    title: string;
    completed: number;
    created_at: string;
    updated_at: string;
}

interface SyncRow {
    local_id: string;
    provider: string;
    external_id: string | null;
    status: TaskSyncStatus;
    last_error: string | null;
    last_attempted_at: string;
}

interface TaskWithSyncRow extends TaskRow {
    provider: string | null;
    external_id: string | null;
    status: TaskSyncStatus | null;
    last_error: string | null;
    last_attempted_at: string | null;
}

interface CountRow {
    total: number;
    open: number | null;
    completed: number | null;
}

interface BridgeStatusRow {
    bridge_name: string;
    vault_name: string;
    last_run_at: string;
    status: BridgeHealth;
    notes_found: number;
    converted: number;
    skipped: number;
    no_text: number;
    tool_missing: number;
    tool_failed: number;
    source_missing: number;
    vault_missing: number;
    tasks_total: number;
    tasks_open: number;
    tasks_completed: number;
    error_message: string | null;
}

interface HistoryRow {
    id: number;
    bridge_name: string;
    run_at: string;
    notes_found: number;
    converted: number;
    skipped: number;
    tasks_total: number;
    success: number;
}

export interface BridgeStatusEntry extends BridgeRunSummary {
    status: BridgeHealth;
    errorMessage: string | null;
}

export interface HistoryEntry {
    id: number;
    bridgeName: string;
    runAt: string;
    notesFound: number;
    converted: number;
    skipped: number;
    tasksTotal: number;
    success: boolean;
}

export interface TaskListing {
    task: LocalTask;
    record: TaskSyncRecord | null;
}

export interface TaskCounts {
    total: number;
    open: number;
    completed: number;
}

export class NoteBridgeDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        // Ensure directory exists
        const dir = dirname(dbPath);
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true });
        }

        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
        this.db.pragma('busy_timeout = 5000');
    }

    /**
     * Initialize database schema
     */
    initialize(): void {
        this.db.exec(`
      -- One row per extracted task, keyed by its line-position id
      CREATE TABLE IF NOT EXISTS tasks (
        local_id TEXT PRIMARY KEY,
        bridge_name TEXT NOT NULL,
        vault_name TEXT NOT NULL,
        note_path TEXT NOT NULL,
        line_no INTEGER NOT NULL,
        title TEXT NOT NULL,
        completed INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_bridge ON tasks(bridge_name);

      -- Sync state per (task, provider)
      CREATE TABLE IF NOT EXISTS task_sync (
        local_id TEXT NOT NULL REFERENCES tasks(local_id) ON DELETE CASCADE,
        provider TEXT NOT NULL,
        external_id TEXT,
        status TEXT NOT NULL CHECK (status IN ('pending', 'created', 'skipped', 'failed')),
        last_error TEXT,
        last_attempted_at TEXT NOT NULL,
        PRIMARY KEY (local_id, provider)
      );

      CREATE INDEX IF NOT EXISTS idx_task_sync_provider ON task_sync(provider, status);

      -- Latest run summary per bridge
      CREATE TABLE IF NOT EXISTS bridge_status (
        bridge_name TEXT PRIMARY KEY,
        vault_name TEXT NOT NULL,
        last_run_at TEXT NOT NULL,
        status TEXT NOT NULL,
        notes_found INTEGER NOT NULL DEFAULT 0,
        converted INTEGER NOT NULL DEFAULT 0,
        skipped INTEGER NOT NULL DEFAULT 0,
        no_text INTEGER NOT NULL DEFAULT 0,
        tool_missing INTEGER NOT NULL DEFAULT 0,
        tool_failed INTEGER NOT NULL DEFAULT 0,
        source_missing INTEGER NOT NULL DEFAULT 0,
        vault_missing INTEGER NOT NULL DEFAULT 0,
        tasks_total INTEGER NOT NULL DEFAULT 0,
        tasks_open INTEGER NOT NULL DEFAULT 0,
        tasks_completed INTEGER NOT NULL DEFAULT 0,
        error_message TEXT
      );

      -- Bounded run history
      CREATE TABLE IF NOT EXISTS sync_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        bridge_name TEXT NOT NULL,
        run_at TEXT NOT NULL,
        notes_found INTEGER NOT NULL DEFAULT 0,
        converted INTEGER NOT NULL DEFAULT 0,
        skipped INTEGER NOT NULL DEFAULT 0,
        tasks_total INTEGER NOT NULL DEFAULT 0,
        success INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sync_history_bridge ON sync_history(bridge_name, id);
    `);
    }

    /**
     * Insert tasks that are not yet known and promote known ones to completed.
     * Returns the number of newly inserted rows.
     */
    upsertTasks(tasks: LocalTask[], now: string): number {
        const insert = this.db.prepare<[string, string, string, string, number, string, number, string, string]>(`
      INSERT INTO tasks
      (local_id, bridge_name, vault_name, note_path, line_no, title, completed, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(local_id) DO NOTHING
    `);
        const complete = this.db.prepare<[string, string]>(
            'UPDATE tasks SET completed = 1, updated_at = ? WHERE local_id = ? AND completed = 0'
        );

        const apply = this.db.transaction((batch: LocalTask[]): number => {
            let inserted = 0;
            for (const task of batch) {
                const result = insert.run(
                    task.localId,
                    task.bridgeName,
                    task.vaultName,
                    task.notePath,
                    task.lineNo,
                    task.title,
                    task.completed ? 1 : 0,
                    now,
                    now
                );
                if (result.changes > 0) {
                    inserted++;
                } else if (task.completed) {
                    complete.run(now, task.localId);
                }
            }
            return inserted;
        });

        return apply(tasks);
    }

    /**
     * Get a task by local id
     */
    getTask(localId: string): LocalTask | null {
        const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE local_id = ?').get(localId);
        return row ? toTask(row) : null;
    }

    /**
     * Open tasks with no record for the provider, or a pending/failed one
     */
    getPendingTasks(provider: string, bridgeName?: string): LocalTask[] {
        const sql = `
      SELECT t.* FROM tasks t
      LEFT JOIN task_sync s ON s.local_id = t.local_id AND s.provider = ?
      WHERE t.completed = 0
      AND (s.local_id IS NULL OR s.status IN ('pending', 'failed'))
      ${bridgeName ? 'AND t.bridge_name = ?' : ''}
      ORDER BY t.bridge_name, t.note_path, t.line_no
    `;
        const stmt = this.db.prepare<string[], TaskRow>(sql);
        const rows = bridgeName ? stmt.all(provider, bridgeName) : stmt.all(provider);
        return rows.map(toTask);
    }

    /**
     * Write a sync result. A record that already reached 'created' is never changed.
     * Returns true when the row was written.
     */
    upsertSyncRecord(result: TaskSyncResult, attemptedAt: string): boolean {
        const stmt = this.db.prepare<[string, string, string | null, TaskSyncStatus, string | null, string]>(`
      INSERT INTO task_sync (local_id, provider, external_id, status, last_error, last_attempted_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(local_id, provider) DO UPDATE SET
        external_id = excluded.external_id,
        status = excluded.status,
        last_error = excluded.last_error,
        last_attempted_at = excluded.last_attempted_at
      WHERE task_sync.status != 'created'
    `);
        const info = stmt.run(
            result.localId,
            result.provider,
            result.externalId,
            result.status,
            result.error,
            attemptedAt
        );
        return info.changes > 0;
    }

    /**
     * Write many sync results in one transaction
     */
    upsertSyncRecords(results: TaskSyncResult[], attemptedAt: string): number {
        const apply = this.db.transaction((batch: TaskSyncResult[]): number => {
            let written = 0;
            for (const result of batch) {
                if (this.upsertSyncRecord(result, attemptedAt)) {
                    written++;
                }
            }
            return written;
        });
        return apply(results);
    }

    /**
     * Get the sync record of a task for a provider
     */
    getSyncRecord(localId: string, provider: string): TaskSyncRecord | null {
        const row = this.db
            .prepare<[string, string], SyncRow>('SELECT * FROM task_sync WHERE local_id = ? AND provider = ?')
            .get(localId, provider);
        return row ? toRecord(row) : null;
    }

    /**
     * Mark completed tasks of a bridge as 'skipped' for the provider unless already created
     */
    markCompletedSkipped(provider: string, bridgeName: string, now: string): number {
        const stmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO task_sync (local_id, provider, external_id, status, last_error, last_attempted_at)
      SELECT local_id, ?, NULL, 'skipped', NULL, ? FROM tasks
      WHERE completed = 1 AND bridge_name = ?
      ON CONFLICT(local_id, provider) DO UPDATE SET
        status = 'skipped',
        last_error = NULL,
        last_attempted_at = excluded.last_attempted_at
      WHERE task_sync.status IN ('pending', 'failed')
    `);
        return stmt.run(provider, now, bridgeName).changes;
    }

    /**
     * Task counts for a bridge
     */
    getTaskCounts(bridgeName: string): TaskCounts {
        const row = this.db.prepare<[string], CountRow>(`
      SELECT
        COUNT(*) AS total,
        SUM(CASE WHEN completed = 0 THEN 1 ELSE 0 END) AS open,
        SUM(CASE WHEN completed = 1 THEN 1 ELSE 0 END) AS completed
      FROM tasks
      WHERE bridge_name = ?
    `).get(bridgeName);
        return {
            total: row?.total ?? 0,
            open: row?.open ?? 0,
            completed: row?.completed ?? 0,
        };
    }

    /**
     * List tasks together with their record for a provider
     */
    listTasks(provider: string, bridgeName?: string): TaskListing[] {
        const sql = `
      SELECT t.*, s.provider, s.external_id, s.status, s.last_error, s.last_attempted_at
      FROM tasks t
      LEFT JOIN task_sync s ON s.local_id = t.local_id AND s.provider = ?
      ${bridgeName ? 'WHERE t.bridge_name = ?' : ''}
      ORDER BY t.bridge_name, t.note_path, t.line_no
    `;
        const stmt = this.db.prepare<string[], TaskWithSyncRow>(sql);
        const rows = bridgeName ? stmt.all(provider, bridgeName) : stmt.all(provider);
        return rows.map(row => ({
            task: toTask(row),
            record: row.provider && row.status && row.last_attempted_at
                ? {
                    localId: row.local_id,
                    provider: row.provider,
                    externalId: row.external_id,
                    status: row.status,
                    error: row.last_error,
                    lastAttemptedAt: row.last_attempted_at,
                }
                : null,
        }));
    }

    /**
     * Insert or overwrite the latest summary of a bridge
     */
    upsertBridgeStatus(summary: BridgeRunSummary, status: BridgeHealth, errorMessage: string | null): void {
        const stmt = this.db.prepare<[
            string, string, string, BridgeHealth,
            number, number, number, number, number, number,
            number, number, number, number, number,
            string | null,
        ]>(`
      INSERT OR REPLACE INTO bridge_status
      (bridge_name, vault_name, last_run_at, status,
       notes_found, converted, skipped, no_text, tool_missing, tool_failed,
       source_missing, vault_missing, tasks_total, tasks_open, tasks_completed,
       error_message)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
        stmt.run(
            summary.bridgeName,
            summary.vaultName,
            summary.timestamp,
            status,
            summary.notesFound,
            summary.converted,
            summary.skipped,
            summary.noText,
            summary.toolMissing,
            summary.toolFailed,
            summary.sourceMissing ? 1 : 0,
            summary.vaultMissing ? 1 : 0,
            summary.tasksTotal,
            summary.tasksOpen,
            summary.tasksCompleted,
            errorMessage
        );
    }

    /**
     * Get the latest summary of a bridge
     */
    getBridgeStatus(bridgeName: string): BridgeStatusEntry | null {
        const row = this.db
            .prepare<[string], BridgeStatusRow>('SELECT * FROM bridge_status WHERE bridge_name = ?')
            .get(bridgeName);
        return row ? toStatusEntry(row) : null;
    }

    /**
     * Get the latest summary of every bridge
     */
    getAllBridgeStatus(): BridgeStatusEntry[] {
        const rows = this.db
            .prepare<[], BridgeStatusRow>('SELECT * FROM bridge_status ORDER BY bridge_name')
            .all();
        return rows.map(toStatusEntry);
    }

    /**
     * Append a history row and keep only the newest `limit` rows of the bridge
     */
    appendHistory(summary: BridgeRunSummary, success: boolean, limit: number): void {
        const insert = this.db.prepare<[string, string, number, number, number, number, number]>(`
      INSERT INTO sync_history (bridge_name, run_at, notes_found, converted, skipped, tasks_total, success)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
        const trim = this.db.prepare<[string, string, number]>(`
      DELETE FROM sync_history
      WHERE bridge_name = ?
      AND id NOT IN (
        SELECT id FROM sync_history WHERE bridge_name = ? ORDER BY id DESC LIMIT ?
      )
    `);

        this.db.transaction(() => {
            insert.run(
                summary.bridgeName,
                summary.timestamp,
                summary.notesFound,
                summary.converted,
                summary.skipped,
                summary.tasksTotal,
                success ? 1 : 0
            );
            trim.run(summary.bridgeName, summary.bridgeName, limit);
        })();
    }

    /**
     * Get recent history of a bridge, newest first
     */
    getHistory(bridgeName: string, limit: number = 30): HistoryEntry[] {
        const rows = this.db
            .prepare<[string, number], HistoryRow>(
                'SELECT * FROM sync_history WHERE bridge_name = ? ORDER BY id DESC LIMIT ?'
            )
            .all(bridgeName, limit);
        return rows.map(row => ({
            id: row.id,
            bridgeName: row.bridge_name,
            runAt: row.run_at,
            notesFound: row.notes_found,
            converted: row.converted,
            skipped: row.skipped,
            tasksTotal: row.tasks_total,
            success: row.success === 1,
        }));
    }

    /**
     * Close database
     */
    close(): void {
        this.db.close();
    }
}

function toTask(row: TaskRow): LocalTask {
    return {
        localId: row.local_id,
        bridgeName: row.bridge_name,
        vaultName: row.vault_name,
        notePath: row.note_path,
        lineNo: row.line_no,
        title: row.title,
        completed: row.completed === 1,
    };
}

function toRecord(row: SyncRow): TaskSyncRecord {
    return {
        localId: row.local_id,
        provider: row.provider,
        externalId: row.external_id,
        status: row.status,
        error: row.last_error,
        lastAttemptedAt: row.last_attempted_at,
    };
}

function toStatusEntry(row: BridgeStatusRow): BridgeStatusEntry {
    return {
        bridgeName: row.bridge_name,
        vaultName: row.vault_name,
        timestamp: row.last_run_at,
        status: row.status,
        notesFound: row.notes_found,
        converted: row.converted,
        skipped: row.skipped,
        noText: row.no_text,
        toolMissing: row.tool_missing,
        toolFailed: row.tool_failed,
        sourceMissing: row.source_missing === 1,
        vaultMissing: row.vault_missing === 1,
        tasksTotal: row.tasks_total,
        tasksOpen: row.tasks_open,
        tasksCompleted: row.tasks_completed,
        errorMessage: row.error_message,
    };
}
