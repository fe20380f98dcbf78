import { AppConfig, BridgeConfig } from '../types/index.js';
import { NoteBridgeDatabase } from '../storage/database.js';
import { TextExtractor, ToolRunner } from '../processors/extractor.js';
import { pingHealthcheck } from '../notifications/healthcheck.js';
import { Logger } from '../utils/logger.js';
import { FetchFn } from '../utils/http.js';
import { TodoistTaskClient } from '../todo/todoist.js';
import { errorMessage } from '../utils/errors.js';
import { mapWithConcurrency } from '../utils/pool.js';
import { BridgeRunner, BridgeRunResult } from './bridge-runner.js';
import { ProviderManager, ProviderSet } from './provider-manager.js';
import { TaskRegistry } from './task-registry.js';
import { StatusReporter } from './reporter.js';
import { hasErrors } from './summary.js';

export interface SyncResult {
    bridgeName: string;
    result: BridgeRunResult | null;
    error: string | null;       // unexpected failure inside the bridge run
}

export interface SyncEngineOptions {
    config: AppConfig;
    db: NoteBridgeDatabase;
    logger: Logger;
    providers?: ProviderSet;
    runner?: ToolRunner;
    fetch?: FetchFn;
    todoist?: TodoistTaskClient;
    now?: () => Date;
}

/**
 * Sync Engine - runs every enabled bridge and brackets the run with healthcheck pings
 */
export class SyncEngine {
    private bridgeRunner: BridgeRunner;

    constructor(private options: SyncEngineOptions) {
        const { config, db, logger } = options;
        const providers = options.providers ?? new ProviderManager(config, { fetch: options.fetch, todoist: options.todoist }).createAll();

        this.bridgeRunner = new BridgeRunner({
            config,
            providers,
            registry: new TaskRegistry(db, options.now),
            extractor: new TextExtractor({
                command: config.tool.command,
                timeoutMs: config.tool.timeoutMs,
                runner: options.runner,
            }),
            reporter: new StatusReporter(db, {
                notifyMode: config.notifyMode,
                historyLimit: config.historyLimit,
                notifiers: providers.notifiers,
            }),
            logger,
            now: options.now,
        });
    }

    /**
     * Synchronize a single bridge. Unexpected errors are caught so other
     * bridges still run; cancellation propagates.
     */
    async syncBridge(bridge: BridgeConfig, signal: AbortSignal): Promise<SyncResult> {
        try {
            const result = await this.bridgeRunner.run(bridge, signal);
            return { bridgeName: bridge.name, result, error: null };
        } catch (error) {
            signal.throwIfAborted();
            const message = errorMessage(error);
            this.options.logger.child(bridge.name).error(`Bridge run failed: ${message}`);
            return { bridgeName: bridge.name, result: null, error: message };
        }
    }

    /**
     * Synchronize bridges with bounded concurrency
     */
    async syncAll(bridges: BridgeConfig[], signal: AbortSignal): Promise<SyncResult[]> {
        const { config, logger } = this.options;
        const healthcheck = { url: config.healthcheckUrl, fetch: this.options.fetch, logger };

        await pingHealthcheck('start', healthcheck);

        let results: SyncResult[] = [];
        let failed = true;
        try {
            results = await mapWithConcurrency(
                bridges,
                config.concurrency.bridges,
                bridge => this.syncBridge(bridge, signal),
                signal
            );
            signal.throwIfAborted();
            failed = results.some(entry => entry.error !== null || (entry.result !== null && hasErrors(entry.result.summary)));
        } finally {
            await pingHealthcheck(failed ? 'fail' : 'success', healthcheck);
        }

        return results;
    }
}
