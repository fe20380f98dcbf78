import { describe, it, expect, vi } from 'vitest';
import { WebhookNotificationProvider, formatMessage } from '../src/notifications/webhook.js';
import { pingHealthcheck } from '../src/notifications/healthcheck.js';
import { NotificationContext } from '../src/notifications/types.js';
import { NotificationPayload } from '../src/types/index.js';
import { FetchFn } from '../src/utils/http.js';
import { silentLogger } from '../src/utils/logger.js';

const ctx: NotificationContext = { bridgeName: 'work', vaultName: 'WorkVault', logger: silentLogger };

function payload(overrides: Partial<NotificationPayload> = {}): NotificationPayload {
    return {
        bridge: 'work',
        timestamp: '2026-03-01T08:00:00.000Z',
        notes_found: 3,
        converted: 2,
        skipped: 1,
        no_text: 0,
        tool_missing: 0,
        tool_failed: 0,
        supernote_missing: false,
        vault_missing: false,
        ...overrides,
    };
}

describe('Notification Tests', () => {
    describe('formatMessage', () => {
        it('should format a clean run', () => {
            expect(formatMessage(payload(), 'WorkVault')).toBe(
                'NoteBridge: WorkVault - [OK]\n\nNotes: 3\nConverted: 2\nSkipped: 1\nNo text: 0'
            );
        });

        it('should lead with a single error', () => {
            expect(formatMessage(payload({ tool_missing: 3, converted: 0 }), 'WorkVault')).toBe(
                'NoteBridge: WorkVault - [ERROR]\n\nError: Recognition tool not found\n\nNotes: 3\nConverted: 0\nSkipped: 1\nNo text: 0'
            );
        });

        it('should list several errors', () => {
            expect(formatMessage(payload({ tool_failed: 1, vault_missing: true }), 'WorkVault')).toBe(
                'NoteBridge: WorkVault - [ERROR]\n\nErrors:\n- Recognition tool failed\n- Vault is missing\n\n' +
                'Notes: 3\nConverted: 2\nSkipped: 1\nNo text: 0'
            );
        });
    });

    describe('WebhookNotificationProvider', () => {
        it('should skip sending without a URL', async () => {
            const fetchMock = vi.fn<FetchFn>(async () => new Response('ok'));
            const provider = new WebhookNotificationProvider({ timeoutMs: 1000, fetch: fetchMock });

            expect(await provider.send(payload(), ctx)).toBe(false);
            expect(fetchMock).not.toHaveBeenCalled();
        });

        it('should post the payload with title, message and topic', async () => {
            const fetchMock = vi.fn<FetchFn>(async () => new Response('ok', { status: 200 }));
            const provider = new WebhookNotificationProvider({
                url: 'http://localhost:8088/hook',
                topic: 'notes',
                timeoutMs: 1000,
                fetch: fetchMock,
            });

            expect(await provider.send(payload(), ctx)).toBe(true);

            const [url, init] = fetchMock.mock.calls[0];
            expect(url).toBe('http://localhost:8088/hook');
            expect(JSON.parse(String(init.body))).toEqual({
                ...payload(),
                title: 'NoteBridge: work',
                message: formatMessage(payload(), 'WorkVault'),
                topic: 'notes',
            });
        });

        it('should report a non-2xx response as not sent', async () => {
            const provider = new WebhookNotificationProvider({
                url: 'http://localhost:8088/hook',
                timeoutMs: 1000,
                fetch: async () => new Response('nope', { status: 502 }),
            });

            expect(await provider.send(payload(), ctx)).toBe(false);
        });

        it('should never throw on network errors', async () => {
            const provider = new WebhookNotificationProvider({
                url: 'http://localhost:8088/hook',
                timeoutMs: 1000,
                fetch: async () => {
                    throw new Error('connect ECONNREFUSED');
                },
            });

            expect(await provider.send(payload(), ctx)).toBe(false);
        });
    });

    describe('pingHealthcheck', () => {
        it('should append the event suffix to the base URL', async () => {
            const fetchMock = vi.fn<FetchFn>(async () => new Response('OK'));
            const options = { url: 'http://localhost:8089/ping/abc/', fetch: fetchMock, logger: silentLogger };

            await pingHealthcheck('start', options);
            await pingHealthcheck('success', options);
            await pingHealthcheck('fail', options);

            expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
                'http://localhost:8089/ping/abc/start',
                'http://localhost:8089/ping/abc',
                'http://localhost:8089/ping/abc/fail',
            ]);
            expect(fetchMock.mock.calls[0][1].method).toBe('GET');
        });

        it('should do nothing without a URL', async () => {
            const fetchMock = vi.fn<FetchFn>(async () => new Response('OK'));

            await pingHealthcheck('start', { fetch: fetchMock, logger: silentLogger });

            expect(fetchMock).not.toHaveBeenCalled();
        });

        it('should swallow ping failures', async () => {
            const fetchMock = vi.fn<FetchFn>().mockRejectedValue(new Error('offline'));

            await expect(pingHealthcheck('fail', { url: 'http://localhost:8089/ping', fetch: fetchMock, logger: silentLogger }))
                .resolves.toBeUndefined();
        });
    });
});
