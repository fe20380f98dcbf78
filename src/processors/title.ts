const MARKER_RX = /^(?:#{1,6}\s*|[-*+]\s+|\[[ xX]\]\s+|\d+[.)]\s+)+/;
const MAX_TITLE_LENGTH = 80;

/**
 * Title for a converted note: the first non-empty line without its
 * list or heading markers, else the note's file stem, else "Untitled".
 */
export function deriveTitle(markdown: string, stem: string): string {
    const first = markdown.split('\n').find(line => line.trim() !== '') ?? '';
    const candidate = first.trim().replace(MARKER_RX, '').trim();
    return sanitizeTitle(candidate) || sanitizeTitle(stem) || 'Untitled';
}

/**
 * Fold accents, drop anything but word characters, hyphens and spaces
 */
export function sanitizeTitle(value: string): string {
    return value
        .replace(/[\r\n]+/g, ' ')
        .normalize('NFKD')
        .replace(/\p{M}/gu, '')
        .replace(/[^\w\-\s]/g, '')
        .trim()
        .slice(0, MAX_TITLE_LENGTH)
        .trim();
}

/**
 * Ordered union of tag lists
 */
export function mergeTags(...lists: string[][]): string[] {
    return [...new Set(lists.flat().map(tag => tag.trim()).filter(Boolean))];
}
