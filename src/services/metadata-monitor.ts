import { stat } from 'node:fs/promises';
import path from 'node:path';
import { logEvent, logError, logWarning } from '../utils/logger.js';
import type { Notifier } from '../interfaces/notifier.js';
import type { ChangeTracker } from './change-tracker.js';
import type { MetadataCleaner } from './metadata-cleaner.js';
import type { MetadataExtractor } from './metadata-extractor.js';
import {
    DEFAULT_MAX_SUMMARY_CHARS,
    formatCleaningSummary,
    formatDetectionSummary,
} from './report-formatter.js';
import type { CleanResult, ProcessOutcome } from '../types/metadata.js';

export interface MetadataMonitorDeps {
    /** Watched root; summaries show paths relative to it. */
    rootDir: string;
    extractor: MetadataExtractor;
    tracker: ChangeTracker;
    notifier: Notifier;
    /** `null` disables cleaning. */
    cleaner: MetadataCleaner | null;
    maxSummaryChars?: number;
}

export interface ScanSummary {
    processed: number;
    reported: number;
    cleaned: number;
    skipped: number;
}

/**
 * The processing pipeline: stat → extract → track → notify → clean.
 *
 * Paths are processed strictly one at a time in arrival order, so the
 * tracker's state is never raced and a file is never cleaned twice at once.
 */
export class MetadataMonitor {
    readonly #rootDir: string;
    readonly #extractor: MetadataExtractor;
    readonly #tracker: ChangeTracker;
    readonly #notifier: Notifier;
    readonly #cleaner: MetadataCleaner | null;
    readonly #maxSummaryChars: number;
    #tail: Promise<unknown> = Promise.resolve();
    #pending = 0;
    #closed = false;

    constructor(deps: MetadataMonitorDeps) {
        this.#rootDir = path.resolve(deps.rootDir);
        this.#extractor = deps.extractor;
        this.#tracker = deps.tracker;
        this.#notifier = deps.notifier;
        this.#cleaner = deps.cleaner;
        this.#maxSummaryChars = deps.maxSummaryChars ?? DEFAULT_MAX_SUMMARY_CHARS;
    }

    /** Number of paths queued or in progress. */
    get pending(): number {
        return this.#pending;
    }

    /** Queue a path; resolves with its outcome once it has been processed. */
    enqueue(filePath: string): Promise<ProcessOutcome> {
        this.#pending += 1;
        const run = this.#tail.then(() => this.#process(path.resolve(filePath)));
        this.#tail = run.then(
            () => undefined,
            () => undefined,
        );
        return run.finally(() => {
            this.#pending -= 1;
        });
    }

    /**
     * Stop taking work. Paths still waiting in the queue resolve as skipped;
     * the one in progress finishes.
     */
    close(): void {
        this.#closed = true;
    }

    /** Resolves once everything queued so far has been processed. */
    async drain(): Promise<void> {
        await this.#tail;
    }

    /** Process a batch of paths and tally the outcomes. */
    async scanAll(filePaths: readonly string[]): Promise<ScanSummary> {
        const summary: ScanSummary = { processed: 0, reported: 0, cleaned: 0, skipped: 0 };
        const outcomes = await Promise.all(filePaths.map((filePath) => this.enqueue(filePath)));

        for (const outcome of outcomes) {
            summary.processed += 1;
            if (outcome.status === 'skipped') summary.skipped += 1;
            if (outcome.status === 'reported') {
                summary.reported += 1;
                if (outcome.cleaning?.ok) summary.cleaned += 1;
            }
        }

        if (summary.reported === 0) {
            await logEvent(`[Monitor] Scan finished: no files with new metadata (${summary.processed} checked).`);
        } else {
            await logEvent(
                `[Monitor] Scan finished: ${summary.reported} files with new metadata, ` +
                `${summary.cleaned} cleaned (${summary.processed} checked).`,
            );
        }
        return summary;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #process(filePath: string): Promise<ProcessOutcome> {
        if (this.#closed) return { status: 'skipped', path: filePath, reason: 'shutdown' };

        let mtimeMs: number;
        try {
            const stats = await stat(filePath);
            if (!stats.isFile()) {
                return { status: 'skipped', path: filePath, reason: 'not-a-file' };
            }
            mtimeMs = stats.mtimeMs;
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            await logWarning(`[Monitor] Skipping ${filePath}: ${message}`);
            return { status: 'skipped', path: filePath, reason: 'missing' };
        }

        const extraction = await this.#extractor.extract(filePath);
        const { record } = extraction;
        const observation = await this.#tracker.observe(filePath, record, { mtimeMs });

        if (!observation.isNew) {
            return { status: 'unchanged', path: filePath };
        }

        const relativePath = this.#relative(filePath);
        const fieldCount = Object.keys(record).length;

        if (fieldCount === 0) {
            if (observation.previous && observation.previous.fieldCount > 0) {
                await logEvent(`[Monitor] Metadata no longer present in ${relativePath}.`);
            }
            return extraction.error
                ? { status: 'clear', path: filePath, extractionError: extraction.error }
                : { status: 'clear', path: filePath };
        }

        await logEvent(`[Monitor] New metadata in ${relativePath} (${fieldCount} fields).`);

        const summary = formatDetectionSummary({
            relativePath,
            record,
            changed: observation.previous !== undefined,
            maxChars: this.#maxSummaryChars,
        });
        const delivery = await this.#notifier.notify(summary);
        if (!delivery.ok) {
            await logError(
                `[Monitor] Notification via ${this.#notifier.channel} failed for ${relativePath}: ` +
                `${delivery.errorMessage ?? 'unknown error'}`,
            );
        }

        let cleaning: CleanResult | null = null;
        if (this.#cleaner) {
            cleaning = await this.#cleaner.clean(filePath);
            if (cleaning.ok) {
                await logEvent(`[Monitor] Metadata removed from ${relativePath} using ${cleaning.tool ?? 'exiftool'}.`);
            } else {
                await logError(
                    `[Monitor] Failed to remove metadata from ${relativePath}: ${cleaning.errorMessage ?? 'unknown error'}`,
                );
            }

            const followUp = await this.#notifier.notify(formatCleaningSummary(relativePath, cleaning));
            if (!followUp.ok) {
                await logError(`[Monitor] Cleaning notification failed for ${relativePath}.`);
            }
        }

        return { status: 'reported', path: filePath, record, notified: delivery.ok, cleaning };
    }

    #relative(filePath: string): string {
        const relative = path.relative(this.#rootDir, filePath);
        if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
            return filePath;
        }
        return relative.split(path.sep).join('/');
    }
}
