import { SyncEngine, SyncResult } from '../core/sync-engine.js';
import { createLogger, loadConfig, openDatabase } from './shared.js';

export interface RunOptions {
    bridge?: string;
    config?: string;
    verbose?: boolean;
}

/**
 * Run enabled bridges. Resolves to the process exit code.
 */
export async function runBridges(options: RunOptions): Promise<number> {
    const configManager = loadConfig(options.config);
    const config = configManager.getConfig();
    const bridges = configManager.getEnabledBridges(options.bridge);
    const logger = createLogger(options.verbose);

    if (bridges.length === 0) {
        console.log(`No enabled bridges in ${configManager.getConfigPath()}`);
        return 0;
    }

    const db = await openDatabase();
    const controller = new AbortController();
    const cancel = (): void => {
        logger.warn('Cancelling run...');
        controller.abort();
    };
    process.once('SIGINT', cancel);
    process.once('SIGTERM', cancel);

    try {
        const engine = new SyncEngine({ config, db, logger });
        const results = await engine.syncAll(bridges, controller.signal);
        results.forEach(printResult);
        return results.some(entry => entry.error !== null) ? 1 : 0;
    } finally {
        process.off('SIGINT', cancel);
        process.off('SIGTERM', cancel);
        db.close();
    }
}

function printResult(entry: SyncResult): void {
    if (!entry.result) {
        console.log(`✗ ${entry.bridgeName}: ${entry.error}`);
        return;
    }

    const { summary, report, tasks } = entry.result;
    const mark = report.health === 'success' ? '✓' : report.health === 'warning' ? '!' : '✗';
    const parts = [
        `${summary.notesFound} found`,
        `${summary.converted} converted`,
        `${summary.skipped} skipped`,
    ];
    if (summary.noText > 0) parts.push(`${summary.noText} no text`);
    if (summary.toolMissing > 0) parts.push(`${summary.toolMissing} tool missing`);
    if (summary.toolFailed > 0) parts.push(`${summary.toolFailed} tool failed`);
    if (summary.sourceMissing) parts.push('source missing');
    if (summary.vaultMissing) parts.push('vault missing');
    parts.push(`tasks ${summary.tasksTotal} (${summary.tasksOpen} open)`);
    if (tasks && tasks.submitted > 0) {
        parts.push(`${tasks.provider}: ${tasks.created} created, ${tasks.failed} failed`);
    }

    console.log(`${mark} ${summary.bridgeName}: ${parts.join(', ')}`);
}
