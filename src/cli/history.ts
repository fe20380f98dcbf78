import { openDatabase } from './shared.js';

export interface HistoryOptions {
    limit?: number;
}

export async function showHistory(bridgeName: string, options: HistoryOptions): Promise<void> {
    const db = await openDatabase();
    const entries = db.getHistory(bridgeName, options.limit);

    if (entries.length === 0) {
        console.log(`No history for bridge: ${bridgeName}`);
        db.close();
        return;
    }

    console.log(`Run history for bridge: ${bridgeName}\n`);
    for (const entry of entries) {
        console.log(
            `${entry.success ? '✓' : '✗'} ${entry.runAt}  ` +
            `found=${entry.notesFound} converted=${entry.converted} skipped=${entry.skipped} tasks=${entry.tasksTotal}`
        );
    }

    db.close();
}
