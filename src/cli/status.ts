import { openDatabase } from './shared.js';

export async function showStatus(): Promise<void> {
    const db = await openDatabase();
    const entries = db.getAllBridgeStatus();

    if (entries.length === 0) {
        console.log("No runs yet. Run 'notebridge run' first.");
        db.close();
        return;
    }

    for (const entry of entries) {
        console.log(`${entry.bridgeName} (${entry.vaultName}): ${entry.status}`);
        console.log(`  Last run: ${entry.timestamp}`);
        console.log(
            `  Notes: ${entry.notesFound} found, ${entry.converted} converted, ` +
            `${entry.skipped} skipped, ${entry.noText} no text`
        );
        console.log(`  Tasks: ${entry.tasksTotal} (${entry.tasksOpen} open, ${entry.tasksCompleted} completed)`);
        if (entry.errorMessage) {
            console.log(`  Errors: ${entry.errorMessage}`);
        }
        console.log('');
    }

    db.close();
}
