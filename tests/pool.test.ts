import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../src/utils/pool.js';

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

describe('mapWithConcurrency Tests', () => {
    it('should return results in input order', async () => {
        const results = await mapWithConcurrency([30, 10, 20], 3, async ms => {
            await delay(ms);
            return ms;
        });

        expect(results).toEqual([30, 10, 20]);
    });

    it('should never exceed the limit', async () => {
        let active = 0;
        let peak = 0;

        await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
            active++;
            peak = Math.max(peak, active);
            await delay(5);
            active--;
        });

        expect(peak).toBe(2);
    });

    it('should handle an empty list', async () => {
        expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
    });

    it('should reject with the first error', async () => {
        await expect(mapWithConcurrency([1, 2, 3], 1, async item => {
            if (item === 2) throw new Error('item 2 failed');
            return item;
        })).rejects.toThrow('item 2 failed');
    });

    it('should start no new items after abort', async () => {
        const controller = new AbortController();
        const started: number[] = [];

        const results = await mapWithConcurrency([1, 2, 3, 4], 1, async item => {
            started.push(item);
            if (item === 2) controller.abort();
            return item;
        }, controller.signal);

        expect(started).toEqual([1, 2]);
        expect(results).toEqual([1, 2]);
    });
});
