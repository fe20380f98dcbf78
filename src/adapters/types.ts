import { SourceNote, SourceProviderKind } from '../types/index.js';

/**
 * Which bridge a source adapter is scanning for
 */
export interface SourceContext {
    bridgeName: string;
    sourceSubdir?: string;  // joined onto the adapter's root
    sourcePath?: string;    // absolute override of root + subdir
}

/**
 * Source adapter interface
 */
export interface SourceAdapter {
    readonly type: SourceProviderKind;

    /**
     * Directory holding the bridge's notes, or null when it cannot be determined.
     * The directory may not exist.
     */
    getRoot(ctx: SourceContext): string | null;

    /**
     * List every recognized note under the bridge root, sorted by relative path.
     * A missing root yields an empty list.
     */
    scan(ctx: SourceContext): Promise<SourceNote[]>;
}
