import { LocalTask } from '../types/index.js';

export const TASK_LINE_RX = /^(\s*)-\s\[( |x|X)\]\s+(.*)$/;

/**
 * Where a Markdown body lives
 */
export interface TaskSource {
    bridgeName: string;
    vaultName: string;
    notePath: string;       // posix path of the .md file relative to the vault
}

/**
 * Local id of the task at a 1-based line of a note.
 * Ids are positional: moving a task to another line gives it a new id.
 */
export function buildLocalId(bridgeName: string, notePath: string, lineNo: number): string {
    return `${bridgeName}:${notePath}:${lineNo}`;
}

/**
 * Find `- [ ]` / `- [x]` items in transformed Markdown
 */
export function extractTasks(markdown: string, source: TaskSource): LocalTask[] {
    const tasks: LocalTask[] = [];

    markdown.split('\n').forEach((line, index) => {
        const match = TASK_LINE_RX.exec(line);
        if (!match) return;

        const title = match[3].trim();
        if (!title) return;

        const lineNo = index + 1;
        tasks.push({
            localId: buildLocalId(source.bridgeName, source.notePath, lineNo),
            bridgeName: source.bridgeName,
            vaultName: source.vaultName,
            notePath: source.notePath,
            lineNo,
            title,
            completed: match[2].toLowerCase() === 'x',
        });
    });

    return tasks;
}
