import { stat } from 'node:fs/promises';
import path from 'node:path';
import { logEvent, logWarning, registerSecret } from '../utils/logger.js';
import { createCommandRunner, type CommandRunner } from '../utils/command.js';
import { validateConfig, formatConfigIssues } from '../config/config-validator.js';
import type { SentinelConfig } from '../config/json-config.js';
import { ChangeTracker } from '../services/change-tracker.js';
import { ExifToolBackend, type MetadataBackend } from '../services/exiftool-backend.js';
import { EventWatchDriver } from '../services/file-watcher.js';
import { MetadataCleaner } from '../services/metadata-cleaner.js';
import { MetadataExtractor } from '../services/metadata-extractor.js';
import { MetadataMonitor, type ScanSummary } from '../services/metadata-monitor.js';
import { PollingWatchDriver } from '../services/polling-watcher.js';
import { formatLifecycleMessage } from '../services/report-formatter.js';
import {
    InMemorySeenStateStore,
    JsonFileSeenStateStore,
    type SeenStateStore,
} from '../services/seen-state-store.js';
import { createIgnorePredicate, listFiles } from '../services/watch-filters.js';
import { LogNotifier, type Notifier } from '../interfaces/notifier.js';
import { TelegramNotifier } from '../interfaces/telegram_notifier.js';
import { detectTools, type ToolAvailability } from './doctor.js';
import { ConfigError, StartupError } from './errors.js';
import type { CliOverrides } from './cli.js';
import type { WatchDriver } from '../types/file-watcher.js';

/** Overlay command-line values on the loaded configuration. */
export function applyCliOverrides(config: SentinelConfig, overrides: CliOverrides): SentinelConfig {
    const telegram = { ...config.notifications.telegram };
    if (overrides.botToken !== undefined) telegram.botToken = overrides.botToken;
    if (overrides.chatId !== undefined) telegram.chatId = overrides.chatId;
    if (overrides.botToken !== undefined || overrides.chatId !== undefined) telegram.enabled = true;

    return {
        watch: {
            directory: overrides.directory ?? config.watch.directory,
            mode: overrides.mode ?? config.watch.mode,
            intervalSeconds: overrides.intervalSeconds ?? config.watch.intervalSeconds,
            exclude: [...config.watch.exclude, ...(overrides.exclude ?? [])],
        },
        cleaning: { enabled: overrides.cleaning ?? config.cleaning.enabled },
        notifications: { maxSummaryChars: config.notifications.maxSummaryChars, telegram },
        state: { persistPath: overrides.statePath ?? config.state.persistPath },
        logging: { filePath: overrides.logFilePath ?? config.logging.filePath },
    };
}

/** Pick the watch driver implementation for the configured mode. */
export function createWatchDriver(config: SentinelConfig): WatchDriver {
    const target = { directory: config.watch.directory, exclude: config.watch.exclude };
    if (config.watch.mode === 'poll') {
        return new PollingWatchDriver({ ...target, intervalSeconds: config.watch.intervalSeconds });
    }
    return new EventWatchDriver(target);
}

export function createNotifier(config: SentinelConfig): Notifier {
    const telegram = config.notifications.telegram;
    if (telegram.enabled && telegram.botToken && telegram.chatId) {
        return new TelegramNotifier(telegram.botToken, telegram.chatId);
    }
    return new LogNotifier();
}

export function createSeenStateStore(config: SentinelConfig): SeenStateStore {
    return config.state.persistPath
        ? new JsonFileSeenStateStore(config.state.persistPath)
        : new InMemorySeenStateStore();
}

export interface SentinelDeps {
    backend?: MetadataBackend;
    runCommand?: CommandRunner;
    notifier?: Notifier;
    store?: SeenStateStore;
    driver?: WatchDriver;
}

/**
 * Composition root: validates the configuration, probes the external tools and
 * wires the watch driver into the processing pipeline.
 */
export class MetadataSentinel {
    readonly #config: SentinelConfig;
    readonly #backend: MetadataBackend;
    readonly #notifier: Notifier;
    readonly #monitor: MetadataMonitor;
    readonly #driver: WatchDriver;
    readonly #tools: ToolAvailability;
    #running = false;
    #stopping: Promise<void> | null = null;

    private constructor(
        config: SentinelConfig,
        backend: MetadataBackend,
        notifier: Notifier,
        monitor: MetadataMonitor,
        driver: WatchDriver,
        tools: ToolAvailability,
    ) {
        this.#config = config;
        this.#backend = backend;
        this.#notifier = notifier;
        this.#monitor = monitor;
        this.#driver = driver;
        this.#tools = tools;
    }

    /**
     * Validate and assemble. Throws {@link ConfigError} for bad settings and
     * {@link StartupError} when the directory or a required tool is missing.
     */
    static async create(input: SentinelConfig, deps: SentinelDeps = {}): Promise<MetadataSentinel> {
        const validation = validateConfig(input);
        if (!validation.ok) {
            const first = validation.issues[0];
            throw new ConfigError(
                `Invalid configuration:\n${formatConfigIssues(validation.issues)}`,
                first?.remediation,
            );
        }

        const config: SentinelConfig = {
            ...input,
            watch: { ...input.watch, directory: path.resolve(input.watch.directory) },
        };
        await assertDirectory(config.watch.directory);

        if (config.notifications.telegram.botToken) {
            registerSecret(config.notifications.telegram.botToken);
        }

        const backend = deps.backend ?? new ExifToolBackend();
        const tools = await detectTools(backend, deps.runCommand ?? createCommandRunner());

        if (!tools.exiftool.available) {
            throw new StartupError(
                `ExifTool is unavailable: ${tools.exiftool.error ?? 'unknown error'}`,
                'Install Perl (required by exiftool-vendored on this platform) and run `metadata-sentinel doctor`.',
            );
        }
        if (!tools.qpdf.available) {
            await logWarning('[Sentinel] qpdf not found; PDFs that ExifTool cannot rewrite will stay uncleaned.');
        }

        const notifier = deps.notifier ?? createNotifier(config);
        if (notifier.channel === 'log') {
            await logWarning('[Sentinel] Telegram is not configured; reports are written to the log only.');
        }

        const cleaner = config.cleaning.enabled
            ? new MetadataCleaner(backend, {
                qpdfAvailable: tools.qpdf.available,
                runCommand: deps.runCommand,
            })
            : null;

        const monitor = new MetadataMonitor({
            rootDir: config.watch.directory,
            extractor: new MetadataExtractor(backend),
            tracker: new ChangeTracker(deps.store ?? createSeenStateStore(config)),
            notifier,
            cleaner,
            maxSummaryChars: config.notifications.maxSummaryChars,
        });

        const driver = deps.driver ?? createWatchDriver(config);
        return new MetadataSentinel(config, backend, notifier, monitor, driver, tools);
    }

    get config(): SentinelConfig {
        return this.#config;
    }

    get tools(): ToolAvailability {
        return this.#tools;
    }

    get monitor(): MetadataMonitor {
        return this.#monitor;
    }

    /** Start watching. Resolves after the initial scan has been processed. */
    async start(): Promise<void> {
        if (this.#running) return;

        const { directory, mode } = this.#config.watch;
        await logEvent(
            `[Sentinel] Monitoring ${directory} in ${mode} mode` +
            (mode === 'poll' ? ` every ${this.#config.watch.intervalSeconds}s` : '') +
            `; cleaning ${this.#config.cleaning.enabled ? 'enabled' : 'disabled'}.`,
        );
        await this.#notifier.notify(formatLifecycleMessage('started', directory));

        // Running from here on, so a shutdown can interrupt the initial scan.
        this.#running = true;
        try {
            await this.#driver.start((event) => this.#monitor.enqueue(event.path).then(() => undefined));
        } catch (err) {
            this.#running = false;
            await this.#driver.stop();
            const message = err instanceof Error ? err.message : String(err);
            throw new StartupError(`Failed to start watching ${directory}: ${message}`, undefined, err);
        }
    }

    /** Inspect every file once without watching. */
    async runOnce(): Promise<ScanSummary> {
        const { directory, exclude } = this.#config.watch;
        const files = await listFiles(directory, createIgnorePredicate(directory, exclude));
        await logEvent(`[Sentinel] Scanning ${directory} (${files.length} files).`);
        return this.#monitor.scanAll(files);
    }

    /**
     * Stop the driver, let the file in progress finish, announce shutdown and
     * end ExifTool. Safe to call while `start` or `runOnce` is still scanning;
     * later calls share the first one's result.
     */
    shutdown(): Promise<void> {
        if (!this.#stopping) this.#stopping = this.#shutdown();
        return this.#stopping;
    }

    async #shutdown(): Promise<void> {
        const wasRunning = this.#running;
        this.#running = false;
        if (wasRunning) await this.#driver.stop();
        this.#monitor.close();
        await this.#monitor.drain();
        if (wasRunning) {
            await this.#notifier.notify(formatLifecycleMessage('stopped', this.#config.watch.directory));
        }
        await this.#notifier.stop?.();
        await this.#backend.end();
        await logEvent('[Sentinel] Shutdown complete.');
    }
}

async function assertDirectory(directory: string): Promise<void> {
    try {
        const stats = await stat(directory);
        if (!stats.isDirectory()) {
            throw new StartupError(`${directory} is not a directory.`, 'Pass the folder to watch, not a file.');
        }
    } catch (err) {
        if (err instanceof StartupError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new StartupError(`Folder ${directory} does not exist or cannot be read: ${message}`, 'Create the folder or fix the path.', err);
    }
}
