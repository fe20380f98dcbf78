import { BridgeHealth, BridgeRunSummary, NotificationPayload, NotifyMode } from '../types/index.js';

/**
 * Empty summary for a bridge run
 */
export function createSummary(bridgeName: string, vaultName: string, timestamp: string): BridgeRunSummary {
    return {
        bridgeName,
        vaultName,
        timestamp,
        notesFound: 0,
        converted: 0,
        skipped: 0,
        noText: 0,
        toolMissing: 0,
        toolFailed: 0,
        tasksTotal: 0,
        tasksOpen: 0,
        tasksCompleted: 0,
        sourceMissing: false,
        vaultMissing: false,
    };
}

/**
 * error: a path was missing; warning: the tool was missing or failed
 */
export function bridgeHealth(summary: BridgeRunSummary): BridgeHealth {
    if (summary.sourceMissing || summary.vaultMissing) {
        return 'error';
    }
    if (summary.toolMissing > 0 || summary.toolFailed > 0) {
        return 'warning';
    }
    return 'success';
}

/**
 * Whether the run had a structural or tool error. Notes without text do not count.
 */
export function hasErrors(summary: BridgeRunSummary): boolean {
    return bridgeHealth(summary) !== 'success';
}

/**
 * Human-readable problems of a run
 */
export function summaryErrors(summary: BridgeRunSummary): string[] {
    const errors: string[] = [];
    if (summary.sourceMissing) {
        errors.push('Source note folder does not exist.');
    }
    if (summary.vaultMissing) {
        errors.push('Vault does not exist.');
    }
    if (summary.toolMissing > 0) {
        errors.push(`Recognition tool missing for ${summary.toolMissing} note(s).`);
    }
    if (summary.toolFailed > 0) {
        errors.push(`Recognition tool failed for ${summary.toolFailed} note(s).`);
    }
    if (summary.noText > 0 && summary.toolMissing === 0 && summary.toolFailed === 0) {
        errors.push(`No text extracted for ${summary.noText} note(s).`);
    }
    return errors;
}

/**
 * Whether the notification policy wants this run reported
 */
export function shouldNotify(mode: NotifyMode, summary: BridgeRunSummary): boolean {
    switch (mode) {
        case 'all':
            return true;
        case 'errors':
            return hasErrors(summary);
        case 'none':
            return false;
    }
}

/**
 * Flat payload sent to notification providers
 */
export function toPayload(summary: BridgeRunSummary): NotificationPayload {
    return {
        bridge: summary.bridgeName,
        timestamp: summary.timestamp,
        notes_found: summary.notesFound,
        converted: summary.converted,
        skipped: summary.skipped,
        no_text: summary.noText,
        tool_missing: summary.toolMissing,
        tool_failed: summary.toolFailed,
        supernote_missing: summary.sourceMissing,
        vault_missing: summary.vaultMissing,
    };
}
