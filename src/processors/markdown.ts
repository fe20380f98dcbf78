/**
 * Options for a single transform
 */
export interface TransformOptions {
    aggressive?: boolean;   // merge wrapped lines even when casing or punctuation disagree
}

const BULLET_GLYPHS = '•*+·►–—';

// Lines that begin a new block and are never merged into the line above
const BLOCK_START_RX = new RegExp(`^\\s*(?:-|[${BULLET_GLYPHS}]\\s|\\[[ xX]\\]|\\d+[.)]\\s|#)`);
const TASKISH_RX = /^\s*(?:\(\]|I\]|l\]|1\]|\|\]|☐|☑|☒|\[×\]|[［【〖『])/;
const HEADING_LINE_RX = /^\s*#/;

const RULE_RX = /^\s*-{3,}\s*$/;
const EXTRA_HYPHEN_RX = /^\s*-\s+(-{1,5})\s*(\S.*)$/;
const HYPHEN_BULLET_RX = /^\s*(-{1,6})\s*(\S.*)$/;
const GLYPH_BULLET_RX = new RegExp(`^\\s*[${BULLET_GLYPHS}]\\s+(\\S.*)$`);
const NESTED_MARKER_RX = /^(-{1,6})\s+(\S.*)$/;
const PAREN_NUMBER_RX = /^(\s*)(\d+)\)\s+/;

const HEADING_NO_SPACE_RX = /^(\s*)(#{1,6})(\p{L}.*)$/u;
const INLINE_HEADING_RX = /^(.*?\S)\s+(#{2,6}\s*|#\s+)(\p{L}.*)$/u;

const MISREAD_BOX_RX = /^(\s*(?:-\s+)?)(?:\(\]|I\]|l\]|1\]|\|\])/;
const CHECKBOX_RX = /^\s*\[( |x|X)\]\s*(.*)$/;
const TASK_MARK_RX = /^(\s*-\s\[)X(\])/;

const PREFIX_RX = /^(\s*(?:[-*+]\s+)?(?:\[[ xX]\]\s*)?(?:#{1,6}\s+)?(?:\d+[.)]\s+)?)(.*)$/;
const FIRST_LETTER_RX = /^([^\p{L}]*)(\p{Ll})/u;

/**
 * Turns raw recognizer text into Markdown.
 *
 * Steps run in a fixed order: unwrap, bullets, headings, checkboxes,
 * capitalization. Output depends only on the input and the options.
 */
export class MarkdownTransformer {
    constructor(private options: TransformOptions = {}) { }

    transform(raw: string): string {
        let lines = raw.replace(/\r\n?/g, '\n').split('\n');

        lines = this.unwrap(lines);
        lines = this.normalizeBullets(lines);
        lines = this.repairHeadings(lines);
        lines = this.normalizeCheckboxes(lines);
        lines = lines.map(line => capitalizeLine(line));

        // Leading blank lines go, the first line keeps its indentation
        return lines.join('\n').replace(/^\s*\n/, '').trimEnd() + '\n';
    }

    /**
     * Merge lines the recognizer wrapped mid-paragraph
     */
    unwrap(lines: string[]): string[] {
        const out: string[] = [];

        for (const line of lines) {
            if (out.length === 0) {
                out.push(line);
                continue;
            }

            const prev = out[out.length - 1];
            const prevHard = prev.trim() === '' || prev.endsWith('  ') || HEADING_LINE_RX.test(prev);
            const currBlock = line.trim() === '' || BLOCK_START_RX.test(line) || TASKISH_RX.test(line);

            if (prevHard || currBlock) {
                out.push(line);
                continue;
            }

            if (!this.options.aggressive) {
                const continues = /^\s*\p{Ll}/u.test(line) && !/[.!?:;]$/.test(prev.trimEnd());
                if (!continues) {
                    out.push(line);
                    continue;
                }
            }

            // "infor-" + "mation" joins without a space
            out[out.length - 1] = /[^\s-]-$/.test(prev)
                ? prev.slice(0, -1) + line.trimStart()
                : prev.trimEnd() + ' ' + line.trimStart();
        }

        return out;
    }

    /**
     * Map hyphen runs and bullet glyphs to nested list items.
     * Depth may grow by at most one level over the previous bullet in a run.
     */
    normalizeBullets(lines: string[]): string[] {
        const out: string[] = [];
        let prevDepth: number | null = null;

        for (const line of lines) {
            if (line.trim() === '' || RULE_RX.test(line)) {
                prevDepth = null;
                out.push(line.trimEnd());
                continue;
            }

            const item = parseBullet(line);
            if (!item) {
                prevDepth = null;
                out.push(line.trimEnd().replace(PAREN_NUMBER_RX, '$1$2. '));
                continue;
            }

            const depth: number = prevDepth === null ? item.depth : Math.min(item.depth, prevDepth + 1);
            prevDepth = depth;
            out.push(`${'  '.repeat(depth - 1)}- ${item.content.trimEnd()}`);
        }

        return out;
    }

    /**
     * Give headings their own line and a space after the markers
     */
    repairHeadings(lines: string[]): string[] {
        const out: string[] = [];

        for (const line of lines) {
            const start = HEADING_NO_SPACE_RX.exec(line);
            if (start) {
                out.push(`${start[1]}${start[2]} ${start[3]}`);
                continue;
            }

            const inline = HEADING_LINE_RX.test(line) ? null : INLINE_HEADING_RX.exec(line);
            if (inline) {
                out.push(inline[1]);
                out.push(`${inline[2].trim()} ${inline[3].trimEnd()}`);
                continue;
            }

            out.push(line);
        }

        return out;
    }

    /**
     * Clean up recognizer checkbox glyphs and turn "[ ] text" into task items
     */
    normalizeCheckboxes(lines: string[]): string[] {
        return lines.map(line => {
            const cleaned = cleanGlyphs(line);

            const box = CHECKBOX_RX.exec(cleaned);
            if (box) {
                const mark = box[1] === ' ' ? ' ' : 'x';
                return `- [${mark}] ${box[2].trimEnd()}`.trimEnd();
            }

            return cleaned.replace(TASK_MARK_RX, '$1x$2');
        });
    }
}

interface BulletItem {
    depth: number;
    content: string;
}

function parseBullet(line: string): BulletItem | null {
    // "- --text": a bullet followed by extra hyphens, one level each
    const extra = EXTRA_HYPHEN_RX.exec(line);
    if (extra) {
        return { depth: 1 + extra[1].length, content: extra[2] };
    }

    const hyphens = HYPHEN_BULLET_RX.exec(line);
    if (hyphens) {
        return { depth: hyphens[1].length, content: hyphens[2] };
    }

    const glyph = GLYPH_BULLET_RX.exec(line);
    if (glyph) {
        // "• -- text" keeps the explicit nesting marker
        const nested = NESTED_MARKER_RX.exec(glyph[1]);
        return nested
            ? { depth: nested[1].length, content: nested[2] }
            : { depth: 1, content: glyph[1] };
    }

    return null;
}

function cleanGlyphs(line: string): string {
    return line
        .replace(/☐/g, '[ ]')
        .replace(/[☑☒]/g, '[x]')
        .replace(/\[×\]/g, '[x]')
        .replace(/[［【〖『]/g, '[')
        .replace(/[］】〗』]/g, ']')
        .replace(MISREAD_BOX_RX, '$1[ ]');
}

/**
 * Upper-case the first letter after any list, checkbox, heading or number
 * prefix, skipping digits and punctuation before it
 */
export function capitalizeLine(line: string): string {
    const match = PREFIX_RX.exec(line);
    if (!match) {
        return line;
    }
    const [, prefix, rest] = match;
    return prefix + rest.replace(FIRST_LETTER_RX, (_all, lead: string, letter: string) => lead + letter.toUpperCase());
}
