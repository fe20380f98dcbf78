import { SourceNote } from '../types/index.js';
import { SourceAdapter } from './types.js';

/**
 * Source adapter that finds nothing
 */
export class NoopAdapter implements SourceAdapter {
    readonly type = 'noop';

    getRoot(): string | null {
        return null;
    }

    async scan(): Promise<SourceNote[]> {
        return [];
    }
}
