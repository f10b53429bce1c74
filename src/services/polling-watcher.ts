import path from 'node:path';
import { logEvent, logError } from '../utils/logger.js';
import { JobScheduler } from './job-scheduler.js';
import { createIgnorePredicate, listFiles } from './watch-filters.js';
import type {
    FileEventListener,
    FileEventType,
    IgnorePredicate,
    WatchDriver,
    WatchTarget,
} from '../types/file-watcher.js';

export const POLL_JOB_ID = 'directory-poll';

/** Cron schedule used when the interval has no exact cron step. */
export const EVERY_SECOND = '* * * * * *';

/** Slack allowed between a gated tick and the interval, for timer jitter. */
const TICK_TOLERANCE_MS = 500;

/**
 * Translate a polling interval in seconds into a six-field `node-cron`
 * expression that fires at exactly that period. Returns `null` when the
 * interval cannot be expressed as an evenly repeating cron step.
 */
export function intervalToCron(intervalSeconds: number): string | null {
    if (!isValidInterval(intervalSeconds)) return null;

    if (intervalSeconds < 60) {
        return 60 % intervalSeconds === 0 ? `*/${intervalSeconds} * * * * *` : null;
    }

    if (intervalSeconds % 3600 === 0) {
        const hours = intervalSeconds / 3600;
        if (hours === 24) return '0 0 0 * * *';
        return 24 % hours === 0 ? `0 0 */${hours} * * *` : null;
    }

    if (intervalSeconds % 60 === 0) {
        const minutes = intervalSeconds / 60;
        return 60 % minutes === 0 ? `0 */${minutes} * * * *` : null;
    }

    return null;
}

/** Any positive whole number of seconds can be polled. */
export function isValidInterval(intervalSeconds: number): boolean {
    return Number.isInteger(intervalSeconds) && intervalSeconds > 0;
}

export interface PollingWatchOptions extends WatchTarget {
    intervalSeconds: number;
}

/**
 * Polling watch driver: re-lists the whole directory on a fixed interval and
 * emits every file it finds. Deduplication is left to the change tracker.
 *
 * Intervals with an exact cron step are scheduled directly. Any other
 * interval ticks every second and scans once the interval has elapsed since
 * the previous scan started.
 */
export class PollingWatchDriver implements WatchDriver {
    readonly mode = 'poll' as const;
    readonly #directory: string;
    readonly #cronExpression: string;
    /** Minimum gap between scans; null when the cron schedule is exact. */
    readonly #gateMs: number | null;
    readonly #isIgnored: IgnorePredicate;
    readonly #scheduler = new JobScheduler();
    #listener: FileEventListener | null = null;
    #lastScanStartedAt = 0;
    #unsubscribeSkips: (() => void) | null = null;

    constructor(options: PollingWatchOptions) {
        if (!isValidInterval(options.intervalSeconds)) {
            throw new Error(
                `[PollingWatcher] Interval must be a positive whole number of seconds, got ${options.intervalSeconds}.`,
            );
        }

        const exact = intervalToCron(options.intervalSeconds);
        this.#directory = path.resolve(options.directory);
        this.#cronExpression = exact ?? EVERY_SECOND;
        this.#gateMs = exact ? null : options.intervalSeconds * 1000 - TICK_TOLERANCE_MS;
        this.#isIgnored = createIgnorePredicate(this.#directory, options.exclude);
    }

    get cronExpression(): string {
        return this.#cronExpression;
    }

    async start(listener: FileEventListener): Promise<void> {
        if (this.#listener) return;
        this.#listener = listener;

        await this.scanOnce('initial');
        if (!this.#listener) return; // Stopped during the initial scan

        this.#unsubscribeSkips = this.#scheduler.onSkip((tick) => {
            if (tick.jobId !== POLL_JOB_ID) return;
            void logEvent(
                `[PollingWatcher] Previous scan still running; skipped tick (${tick.skippedTicks} so far).`,
            );
        });
        this.#scheduler.register({
            id: POLL_JOB_ID,
            cronExpression: this.#cronExpression,
            description: `Re-scan ${this.#directory}`,
            handler: async () => {
                if (this.#gateMs !== null && Date.now() - this.#lastScanStartedAt < this.#gateMs) return;
                await this.scanOnce('scan');
            },
        });

        await logEvent(`[PollingWatcher] Polling ${this.#directory} on '${this.#cronExpression}'.`);
    }

    async stop(): Promise<void> {
        if (!this.#listener) return;

        this.#listener = null;
        this.#unsubscribeSkips?.();
        this.#unsubscribeSkips = null;
        await this.#scheduler.unregister(POLL_JOB_ID);
        await logEvent(`[PollingWatcher] Stopped polling ${this.#directory}.`);
    }

    /** List the directory once and emit each file. Returns the number emitted. */
    async scanOnce(type: FileEventType = 'scan'): Promise<number> {
        this.#lastScanStartedAt = Date.now();
        const files = await listFiles(this.#directory, this.#isIgnored);
        await logEvent(`[PollingWatcher] Scanning ${this.#directory}: ${files.length} files.`);

        let emitted = 0;
        for (const filePath of files) {
            const listener = this.#listener;
            if (!listener) break; // stopped mid-scan

            try {
                await listener({ type, path: filePath, timestamp: new Date().toISOString() });
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                await logError(`[PollingWatcher] Listener failed for ${filePath}: ${message}`);
            }
            emitted += 1;
        }
        return emitted;
    }
}
