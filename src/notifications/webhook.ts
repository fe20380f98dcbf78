import { NotificationPayload } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { FetchFn, postJson } from '../utils/http.js';
import { NotificationContext, NotificationProvider } from './types.js';

export interface WebhookOptions {
    url?: string;
    topic?: string;
    timeoutMs: number;
    fetch?: FetchFn;
}

/**
 * POSTs the run payload as JSON, plus a title and a readable message
 */
export class WebhookNotificationProvider implements NotificationProvider {
    readonly name = 'webhook';
    private fetchFn: FetchFn;

    constructor(private options: WebhookOptions) {
        this.fetchFn = options.fetch ?? fetch;
    }

    async send(payload: NotificationPayload, ctx: NotificationContext): Promise<boolean> {
        const url = this.options.url?.trim();
        if (!url) {
            ctx.logger.debug('Webhook URL not configured; notification skipped');
            return false;
        }

        const body: Record<string, unknown> = {
            ...payload,
            title: `NoteBridge: ${payload.bridge}`,
            message: formatMessage(payload, ctx.vaultName),
        };
        if (this.options.topic) {
            body.topic = this.options.topic;
        }

        try {
            const response = await postJson(this.fetchFn, url, body, { timeoutMs: this.options.timeoutMs });
            if (!response.ok) {
                ctx.logger.warn(`Webhook returned non-2xx status: ${response.status}`);
                return false;
            }
            ctx.logger.info(`Notification sent (status=${response.status})`);
            return true;
        } catch (error) {
            ctx.logger.warn(`Failed to send notification: ${errorMessage(error)}`);
            return false;
        }
    }
}

/**
 * Problems first, then the counters
 */
export function formatMessage(payload: NotificationPayload, vaultName: string): string {
    const problems: string[] = [];
    if (payload.tool_missing > 0) problems.push('Recognition tool not found');
    if (payload.tool_failed > 0) problems.push('Recognition tool failed');
    if (payload.supernote_missing) problems.push('Source note folder is missing');
    if (payload.vault_missing) problems.push('Vault is missing');

    const lines = [`NoteBridge: ${vaultName} - [${problems.length > 0 ? 'ERROR' : 'OK'}]`, ''];

    if (problems.length === 1) {
        lines.push(`Error: ${problems[0]}`, '');
    } else if (problems.length > 1) {
        lines.push('Errors:', ...problems.map(problem => `- ${problem}`), '');
    }

    lines.push(
        `Notes: ${payload.notes_found}`,
        `Converted: ${payload.converted}`,
        `Skipped: ${payload.skipped}`,
        `No text: ${payload.no_text}`
    );
    return lines.join('\n');
}
