import { BridgeHealth, BridgeRunSummary, NotifyMode } from '../types/index.js';
import { NoteBridgeDatabase } from '../storage/database.js';
import { NoteContext, NoteProvider } from '../notes/types.js';
import { NotificationProvider } from '../notifications/types.js';
import { errorMessage } from '../utils/errors.js';
import { bridgeHealth, hasErrors, shouldNotify, summaryErrors, toPayload } from './summary.js';

export interface ReporterOptions {
    notifyMode: NotifyMode;
    historyLimit: number;
    notifiers: NotificationProvider[];
}

export interface BridgeReport {
    health: BridgeHealth;
    statusPath: string | null;
    notified: boolean;
}

/**
 * Persists a run summary, renders the status artifact and applies the
 * notification policy
 */
export class StatusReporter {
    constructor(
        private db: NoteBridgeDatabase,
        private options: ReporterOptions
    ) { }

    async report(summary: BridgeRunSummary, notes: NoteProvider, ctx: NoteContext): Promise<BridgeReport> {
        const health = bridgeHealth(summary);
        const errors = summaryErrors(summary);

        this.db.upsertBridgeStatus(summary, health, errors.length > 0 ? errors.join(' ') : null);
        this.db.appendHistory(summary, !hasErrors(summary), this.options.historyLimit);

        // No vault, nowhere to write the artifact
        let statusPath: string | null = null;
        if (!summary.vaultMissing) {
            try {
                statusPath = await notes.writeStatusNote(summary, ctx);
            } catch (error) {
                ctx.logger.error(`Failed to write status note: ${errorMessage(error)}`);
            }
        }

        let notified = false;
        if (shouldNotify(this.options.notifyMode, summary)) {
            notified = await this.notify(summary, ctx);
        } else {
            ctx.logger.debug(`Notification suppressed by notify mode '${this.options.notifyMode}' (health=${health})`);
        }

        return { health, statusPath, notified };
    }

    private async notify(summary: BridgeRunSummary, ctx: NoteContext): Promise<boolean> {
        const payload = toPayload(summary);
        const notificationCtx = { bridgeName: ctx.bridgeName, vaultName: ctx.vaultName, logger: ctx.logger };

        let sent = false;
        for (const notifier of this.options.notifiers) {
            try {
                if (await notifier.send(payload, notificationCtx)) {
                    sent = true;
                }
            } catch (error) {
                ctx.logger.warn(`Notification provider ${notifier.name} raised: ${errorMessage(error)}`);
            }
        }
        return sent;
    }
}
