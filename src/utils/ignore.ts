/**
 * Utilities for parsing and matching .notebridgeignore patterns
 * Similar to .gitignore
 */

/**
 * Parse ignore file content into pattern list
 */
export function parseIgnoreFile(content: string): string[] {
    return content
        .split('\n')
        .map(line => line.trim())
        .filter(line => line && !line.startsWith('#'));
}

/**
 * Check if a path should be ignored based on patterns
 * Supports:
 * - Glob patterns: *.tmp, *.bak
 * - Directory patterns: .trash/, Archive/
 * - Negation: !keep.note
 */
export function shouldIgnore(path: string, patterns: string[]): boolean {
    let ignored = false;

    for (const pattern of patterns) {
        if (pattern.startsWith('!')) {
            if (matchPattern(path, pattern.slice(1))) {
                ignored = false;
            }
            continue;
        }

        if (matchPattern(path, pattern)) {
            ignored = true;
        }
    }

    return ignored;
}

/**
 * Match a path against a pattern
 * Supports basic glob patterns and directory matching
 */
function matchPattern(path: string, pattern: string): boolean {
    // Directory pattern (ends with /)
    if (pattern.endsWith('/')) {
        const dir = pattern.slice(0, -1);
        return path === dir || path.startsWith(dir + '/') || path.includes('/' + dir + '/');
    }

    const regexPattern = pattern
        .replace(/[.+^${}()|[\]\\]/g, '\\$&')
        .replace(/\*\*/g, '\u0000')
        .replace(/\*/g, '[^/]*')
        .replace(/\?/g, '[^/]')
        .replace(/\u0000/g, '.*');

    const regex = new RegExp(`^${regexPattern}$`);

    if (regex.test(path)) {
        return true;
    }

    // Patterns without a slash also match the last path segment and any parent directory
    const parts = path.split('/');
    if (!pattern.includes('/') && regex.test(parts[parts.length - 1])) {
        return true;
    }
    for (let i = 1; i < parts.length; i++) {
        if (regex.test(parts.slice(0, i).join('/'))) {
            return true;
        }
    }

    return false;
}

/**
 * Default ignore patterns
 */
export const DEFAULT_IGNORE_PATTERNS = [
    '.trash/',
    '.git/',
    '.DS_Store',
    '*.tmp',
    '*.bak',
    '*.swp',
    '*~',
];
