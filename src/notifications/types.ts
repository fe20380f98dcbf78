import { NotificationPayload } from '../types/index.js';
import { Logger } from '../utils/logger.js';

export interface NotificationContext {
    bridgeName: string;
    vaultName: string;
    logger: Logger;
}

/**
 * Notification provider interface. send() never throws.
 */
export interface NotificationProvider {
    readonly name: string;

    send(payload: NotificationPayload, ctx: NotificationContext): Promise<boolean>;
}
