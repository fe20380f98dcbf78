import { z } from 'zod';

/**
 * Whole-word corrections, wrong -> right
 */
export type ReplacementMap = Record<string, string>;

const LIST_MARKER_RX = /^(?:[-*+]|\d+[.)])\s+/;
const WORD_CHAR = '[\\p{L}\\p{N}_]';

const ReplacementJsonSchema = z.record(z.string(), z.unknown());

/**
 * Parse the Markdown replacement note.
 *
 * One `wrong -> right` pair per line; lines starting with '#' are comments
 * and a leading list marker is ignored.
 */
export function parseReplacementNote(content: string): ReplacementMap {
    const map: ReplacementMap = {};

    for (const raw of content.split(/\r?\n/)) {
        const line = raw.trim().replace(LIST_MARKER_RX, '');
        if (!line || line.startsWith('#')) continue;

        const arrow = line.indexOf('->');
        if (arrow === -1) continue;

        const wrong = line.slice(0, arrow).trim();
        const right = line.slice(arrow + 2).trim();
        if (wrong) {
            map[wrong] = right;
        }
    }

    return map;
}

/**
 * Parse a JSON replacement object. Keys starting with '_' are comments.
 *
 * @throws Error when the value is not an object
 */
export function parseReplacementJson(raw: unknown): ReplacementMap {
    const map: ReplacementMap = {};
    for (const [wrong, right] of Object.entries(ReplacementJsonSchema.parse(raw))) {
        if (wrong.startsWith('_') || typeof right !== 'string' || !wrong.trim()) continue;
        map[wrong.trim()] = right;
    }
    return map;
}

/**
 * Replace whole-word occurrences of each key. A key never matches inside a
 * longer word; longer keys win over their prefixes.
 */
export function applyReplacements(text: string, map: ReplacementMap): string {
    const keys = Object.keys(map).filter(key => key.length > 0);
    if (keys.length === 0) {
        return text;
    }

    const alternation = keys
        .sort((a, b) => b.length - a.length)
        .map(escapeRegExp)
        .join('|');
    const pattern = new RegExp(`(?<!${WORD_CHAR})(?:${alternation})(?!${WORD_CHAR})`, 'gu');

    return text.replace(pattern, word => map[word] ?? word);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
