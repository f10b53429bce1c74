import { watch, type FSWatcher } from 'chokidar';
import path from 'node:path';
import { logEvent, logError } from '../utils/logger.js';
import { createIgnorePredicate, listFiles } from './watch-filters.js';
import type {
    FileEvent,
    FileEventListener,
    FileEventType,
    IgnorePredicate,
    WatchDriver,
    WatchTarget,
} from '../types/file-watcher.js';

/**
 * Event-driven watch driver.
 *
 * Emits every existing file once at start-up, then each file that `chokidar`
 * reports as added or changed. Writes are allowed to settle before a change
 * is emitted so half-written files are not inspected.
 *
 * Usage:
 * ```ts
 * const driver = new EventWatchDriver({ directory: '/srv/uploads', exclude: ['.cache'] });
 * await driver.start((event) => monitor.enqueue(event.path));
 * ```
 */
export class EventWatchDriver implements WatchDriver {
    readonly mode = 'event' as const;
    readonly #target: WatchTarget;
    readonly #isIgnored: IgnorePredicate;
    #watcher: FSWatcher | null = null;
    #listener: FileEventListener | null = null;
    #startAbort: AbortController | null = null;

    constructor(target: WatchTarget) {
        this.#target = { ...target, directory: path.resolve(target.directory) };
        this.#isIgnored = createIgnorePredicate(this.#target.directory, target.exclude);
    }

    get directory(): string {
        return this.#target.directory;
    }

    async start(listener: FileEventListener): Promise<void> {
        if (this.#watcher) return; // Already watching

        this.#listener = listener;

        const watcher = watch(this.#target.directory, {
            ignored: (p: string) => this.#isIgnored(path.resolve(p)),
            persistent: true,
            ignoreInitial: true,
            awaitWriteFinish: {
                stabilityThreshold: 300,
                pollInterval: 100,
            },
        });
        this.#watcher = watcher;

        watcher.on('add', (filePath: string) => {
            void this.#emit('add', filePath);
        });
        watcher.on('change', (filePath: string) => {
            void this.#emit('change', filePath);
        });

        // List after 'ready': a file created meanwhile is listed or reported, never neither.
        const abort = new AbortController();
        this.#startAbort = abort;
        let existing: string[];
        try {
            await waitUntilReady(watcher, abort.signal);
            if (abort.signal.aborted) return; // Stopped while starting
            existing = await listFiles(this.#target.directory, this.#isIgnored);
        } catch (err) {
            await this.stop();
            throw err;
        } finally {
            this.#startAbort = null;
        }

        watcher.on('error', (err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            void logError(`[FileWatcher] Error while watching ${this.#target.directory}: ${message}`);
        });
        await logEvent(`[FileWatcher] Started watching ${this.#target.directory} (${existing.length} existing files).`);

        for (const filePath of existing) {
            await this.#emit('initial', filePath);
        }
    }

    async stop(): Promise<void> {
        const watcher = this.#watcher;
        if (!watcher) return;

        this.#watcher = null;
        this.#listener = null;
        this.#startAbort?.abort();
        await watcher.close();
        await logEvent(`[FileWatcher] Stopped watching ${this.#target.directory}.`);
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #emit(type: FileEventType, filePath: string): Promise<void> {
        const listener = this.#listener;
        if (!listener) return;

        const event: FileEvent = {
            type,
            path: path.resolve(filePath),
            timestamp: new Date().toISOString(),
        };

        if (type !== 'initial') {
            await logEvent(`[FileWatcher] ${type.toUpperCase()} detected: ${event.path}`);
        }

        try {
            await listener(event);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            await logError(`[FileWatcher] Listener failed for ${event.path}: ${message}`);
        }
    }
}

/** Resolves on chokidar's 'ready', or early when `signal` aborts. */
function waitUntilReady(watcher: FSWatcher, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        const cleanup = (): void => {
            watcher.off('ready', onReady);
            watcher.off('error', onError);
            signal.removeEventListener('abort', onReady);
        };
        const onReady = (): void => {
            cleanup();
            resolve();
        };
        const onError = (err: unknown): void => {
            cleanup();
            reject(err instanceof Error ? err : new Error(String(err)));
        };
        watcher.once('ready', onReady);
        watcher.once('error', onError);
        signal.addEventListener('abort', onReady);
    });
}
