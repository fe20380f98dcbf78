import { basename, extname, join, relative, sep } from 'path';
import { AppConfig, BridgeConfig, BridgeRunPhase, BridgeRunSummary, NoteOutcome } from '../types/index.js';
import { SourceContext } from '../adapters/types.js';
import { NoteContext } from '../notes/types.js';
import { TodoContext } from '../todo/types.js';
import { MarkdownTransformer } from '../processors/markdown.js';
import { applyReplacements, ReplacementMap } from '../processors/replacements.js';
import { extractTasks } from '../processors/tasks.js';
import { deriveTitle, mergeTags } from '../processors/title.js';
import { ExtractionError, TextExtractor } from '../processors/extractor.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { isDirectory } from '../utils/fs.js';
import { mapWithConcurrency } from '../utils/pool.js';
import { ChangeDetector, StaleNote } from './changes.js';
import { ProviderSet } from './provider-manager.js';
import { TaskRegistry } from './task-registry.js';
import { SyncCoordinator, TaskSyncReport } from './sync-coordinator.js';
import { BridgeReport, StatusReporter } from './reporter.js';
import { createSummary } from './summary.js';

/**
 * Everything one bridge run needs, passed explicitly through each step
 */
export interface RunContext {
    bridge: BridgeConfig;
    phase: BridgeRunPhase;
    signal: AbortSignal;
    logger: Logger;
    now: () => Date;
    notes: NoteContext;
    source: SourceContext;
    toolMissing: boolean;
}

export interface BridgeRunResult {
    summary: BridgeRunSummary;
    report: BridgeReport;
    tasks: TaskSyncReport | null;
}

export interface BridgeRunnerDeps {
    config: AppConfig;
    providers: ProviderSet;
    registry: TaskRegistry;
    extractor: TextExtractor;
    reporter: StatusReporter;
    logger: Logger;
    now?: () => Date;
}

/**
 * Runs one bridge: validate, scan, convert, sync tasks, report
 */
export class BridgeRunner {
    private now: () => Date;

    constructor(private deps: BridgeRunnerDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    async run(bridge: BridgeConfig, signal: AbortSignal): Promise<BridgeRunResult> {
        const logger = this.deps.logger.child(bridge.name);
        const vaultName = basename(bridge.vaultPath);
        const ctx: RunContext = {
            bridge,
            phase: 'init',
            signal,
            logger,
            now: this.now,
            notes: {
                bridgeName: bridge.name,
                vaultPath: bridge.vaultPath,
                vaultName,
                reservedFolder: this.deps.config.reservedFolder,
                logger,
            },
            source: {
                bridgeName: bridge.name,
                sourceSubdir: bridge.sourceSubdir,
                sourcePath: bridge.sourcePath,
            },
            toolMissing: false,
        };
        const summary = createSummary(bridge.name, vaultName, this.now().toISOString());

        this.enter(ctx, 'validating');
        const valid = await this.validate(ctx, summary);

        let tasks: TaskSyncReport | null = null;
        if (!valid) {
            this.enter(ctx, 'aborted');
        } else {
            try {
                tasks = await this.process(ctx, summary);
            } catch (error) {
                // The run still gets its summary and status artifact, then the error surfaces
                if (signal.aborted) throw error;
                logger.error(`Run stopped during ${ctx.phase}: ${errorMessage(error)}`);
                this.enter(ctx, 'reporting');
                await this.deps.reporter.report(summary, this.deps.providers.notes, ctx.notes);
                throw error;
            }
        }

        this.enter(ctx, 'reporting');
        const report = await this.deps.reporter.report(summary, this.deps.providers.notes, ctx.notes);

        this.enter(ctx, 'done');
        logger.info(
            `found=${summary.notesFound} converted=${summary.converted} skipped=${summary.skipped} ` +
            `no_text=${summary.noText} tool_missing=${summary.toolMissing} tool_failed=${summary.toolFailed} ` +
            `tasks=${summary.tasksTotal} health=${report.health}`
        );
        return { summary, report, tasks };
    }

    private async process(ctx: RunContext, summary: BridgeRunSummary): Promise<TaskSyncReport> {
        const { bridge, logger, signal } = ctx;

        this.enter(ctx, 'scanning');
        const sourceNotes = await this.deps.providers.source.scan(ctx.source);
        const changes = await new ChangeDetector(this.deps.providers.notes, ctx.notes).detectChanges(sourceNotes);
        summary.notesFound = sourceNotes.length;
        summary.skipped = changes.upToDate.length;
        if (sourceNotes.length === 0) {
            logger.info('No note files found');
        }

        this.enter(ctx, 'converting');
        await this.convertAll(ctx, changes.stale, summary);
        signal.throwIfAborted();

        this.enter(ctx, 'task-syncing');
        const tasks = await this.syncTasks(ctx);
        signal.throwIfAborted();

        const counts = this.deps.registry.counts(bridge.name);
        summary.tasksTotal = counts.total;
        summary.tasksOpen = counts.open;
        summary.tasksCompleted = counts.completed;
        return tasks;
    }

    private enter(ctx: RunContext, phase: BridgeRunPhase): void {
        ctx.logger.debug(`${ctx.phase} -> ${phase}`);
        ctx.phase = phase;
    }

    /**
     * Both roots must exist; missing ones are flagged on the summary
     */
    private async validate(ctx: RunContext, summary: BridgeRunSummary): Promise<boolean> {
        const root = this.deps.providers.source.getRoot(ctx.source);
        summary.sourceMissing = !root || !(await isDirectory(root));
        summary.vaultMissing = !(await isDirectory(ctx.bridge.vaultPath));

        if (summary.sourceMissing) {
            ctx.logger.warn(`Source folder does not exist: ${root ?? '(not configured)'}`);
        }
        if (summary.vaultMissing) {
            ctx.logger.warn(`Vault does not exist: ${ctx.bridge.vaultPath}`);
        }
        return !summary.sourceMissing && !summary.vaultMissing;
    }

    private async convertAll(ctx: RunContext, stale: StaleNote[], summary: BridgeRunSummary): Promise<void> {
        if (stale.length === 0) {
            return;
        }

        const replacements = await this.deps.providers.notes.loadReplacements(ctx.notes);
        const transformer = new MarkdownTransformer({ aggressive: ctx.bridge.aggressiveCleanup });

        const outcomes = await mapWithConcurrency(
            stale,
            this.deps.config.concurrency.notes,
            entry => this.processNote(ctx, entry, transformer, replacements),
            ctx.signal
        );

        for (const outcome of outcomes) {
            switch (outcome) {
                case 'converted':
                    summary.converted++;
                    break;
                case 'skipped':
                    summary.skipped++;
                    break;
                case 'no_text':
                    summary.noText++;
                    break;
                case 'tool_missing':
                    summary.toolMissing++;
                    break;
                case 'tool_failed':
                    summary.toolFailed++;
                    break;
            }
        }
    }

    /**
     * Extract, transform, record tasks and write one note
     */
    private async processNote(
        ctx: RunContext,
        entry: StaleNote,
        transformer: MarkdownTransformer,
        replacements: ReplacementMap
    ): Promise<NoteOutcome> {
        // Once the tool is known missing the remaining notes are not attempted
        if (ctx.toolMissing) {
            return 'tool_missing';
        }

        try {
            return await this.convertNote(ctx, entry, transformer, replacements);
        } catch (error) {
            if (ctx.signal.aborted) throw error;
            // Counted with the tool failures
            ctx.logger.error(`Failed to process ${entry.note.relativePath}: ${errorMessage(error)}`);
            return 'tool_failed';
        }
    }

    private async convertNote(
        ctx: RunContext,
        entry: StaleNote,
        transformer: MarkdownTransformer,
        replacements: ReplacementMap
    ): Promise<NoteOutcome> {
        const { note, destination } = entry;
        const { bridge, logger } = ctx;

        let text: string | null;
        try {
            text = await this.deps.extractor.extractText(note.absolutePath, { signal: ctx.signal, logger });
        } catch (error) {
            if (!(error instanceof ExtractionError)) throw error;
            if (error.kind === 'tool_missing') {
                if (!ctx.toolMissing) {
                    ctx.toolMissing = true;
                    logger.error(error.message);
                }
                return 'tool_missing';
            }
            logger.error(error.message);
            return 'tool_failed';
        }

        if (!text) {
            logger.warn(`No text extracted for ${note.relativePath}`);
            return 'no_text';
        }

        const markdown = applyReplacements(transformer.transform(text), replacements);

        const tasks = extractTasks(markdown, {
            bridgeName: bridge.name,
            vaultName: ctx.notes.vaultName,
            notePath: destination,
        });

        const stem = basename(note.relativePath, extname(note.relativePath));
        let body = markdown;

        if (bridge.exportImages) {
            const outDir = join(bridge.vaultPath, bridge.imagesSubdir, bridge.name, stem);
            const images = await this.deps.extractor.exportImages(note.absolutePath, outDir, { signal: ctx.signal, logger });
            if (images.length > 0) {
                body += '\n## Sketches\n\n';
                for (const image of images) {
                    const link = relative(bridge.vaultPath, image).split(sep).join('/');
                    body += `![${basename(image, extname(image))}](${encodeURI(link)})\n`;
                }
            }
        }

        const location = await this.deps.providers.notes.writeNote(
            body,
            {
                title: deriveTitle(markdown, stem),
                tags: mergeTags(this.deps.config.defaultTags, bridge.tags),
                sourceFile: note.relativePath,
                createdDate: ctx.now().toISOString(),
            },
            destination,
            ctx.notes
        );

        // Tasks are registered only once their note is in the vault
        const added = this.deps.registry.upsertTasks(tasks);
        if (tasks.length > 0) {
            logger.debug(`${destination}: ${tasks.length} task(s), ${added} new`);
        }
        logger.info(`OK ${note.relativePath} -> ${location}`);
        return 'converted';
    }

    private async syncTasks(ctx: RunContext): Promise<TaskSyncReport> {
        const { notes, todo } = this.deps.providers;
        const todoCtx: TodoContext = {
            bridgeName: ctx.bridge.name,
            vaultName: ctx.notes.vaultName,
            vaultPath: ctx.bridge.vaultPath,
            buildNoteUrl: notePath => notes.buildNoteUrl(notePath, ctx.notes),
            logger: ctx.logger,
            signal: ctx.signal,
        };
        return new SyncCoordinator(this.deps.registry, todo).sync(todoCtx);
    }
}
