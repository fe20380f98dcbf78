import { NotificationProvider } from './types.js';

export class NoopNotificationProvider implements NotificationProvider {
    readonly name = 'noop';

    async send(): Promise<boolean> {
        return true;
    }
}
