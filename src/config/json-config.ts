import * as fs from 'fs/promises';
import * as path from 'path';
import type { WatchMode } from '../types/file-watcher.js';

export interface SentinelConfig {
    watch: {
        /** Directory to monitor. Usually supplied on the command line. */
        directory: string;
        mode: WatchMode;
        /** Re-scan period in poll mode. */
        intervalSeconds: number;
        /** Path segment names to skip in addition to node_modules and .git. */
        exclude: string[];
    };
    cleaning: {
        enabled: boolean;
    };
    notifications: {
        maxSummaryChars: number;
        telegram: {
            enabled: boolean;
            botToken: string;
            chatId: string;
        };
    };
    state: {
        /** JSON file for seen states; `null` keeps them in memory only. */
        persistPath: string | null;
    };
    logging: {
        filePath: string;
    };
}

export const DEFAULT_CONFIG_FILE = 'metadata-sentinel.json';
export const CONFIG_PATH_ENV = 'METADATA_SENTINEL_CONFIG';

export const DEFAULT_CONFIG: SentinelConfig = {
    watch: {
        directory: '',
        mode: 'event',
        intervalSeconds: 60,
        exclude: [],
    },
    cleaning: {
        enabled: false,
    },
    notifications: {
        maxSummaryChars: 500,
        telegram: {
            enabled: false,
            botToken: '',
            chatId: '',
        },
    },
    state: {
        persistPath: null,
    },
    logging: {
        filePath: 'metadata-sentinel.log',
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    const fromEnv = process.env[CONFIG_PATH_ENV];
    if (fromEnv && fromEnv.trim() !== '') {
        return path.resolve(fromEnv);
    }
    return path.resolve(DEFAULT_CONFIG_FILE);
}

/**
 * Read the JSON config and merge it over the defaults. A missing file yields
 * the defaults; an unreadable or malformed one is an error.
 */
export async function readConfig(overridePath?: string): Promise<SentinelConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code === 'ENOENT' && !overridePath) return applyEnvironment(mergeWithDefaults({}));
        throw new Error(`Failed to read config file at ${targetPath}: ${fsError.message}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
    return applyEnvironment(mergeWithDefaults(parsed), process.env, !setsTelegramSwitch(parsed));
}

/** Deep-copy the defaults and overlay every recognized, well-typed field. */
export function mergeWithDefaults(loaded: unknown): SentinelConfig {
    const config = cloneConfig(DEFAULT_CONFIG);
    if (!isRecord(loaded)) return config;

    const watch = loaded.watch;
    if (isRecord(watch)) {
        if (typeof watch.directory === 'string') config.watch.directory = watch.directory;
        if (watch.mode === 'event' || watch.mode === 'poll') config.watch.mode = watch.mode;
        if (typeof watch.intervalSeconds === 'number') config.watch.intervalSeconds = watch.intervalSeconds;
        if (Array.isArray(watch.exclude)) {
            config.watch.exclude = watch.exclude.filter((value): value is string => typeof value === 'string');
        }
    }

    const cleaning = loaded.cleaning;
    if (isRecord(cleaning) && typeof cleaning.enabled === 'boolean') {
        config.cleaning.enabled = cleaning.enabled;
    }

    const notifications = loaded.notifications;
    if (isRecord(notifications)) {
        if (typeof notifications.maxSummaryChars === 'number') {
            config.notifications.maxSummaryChars = notifications.maxSummaryChars;
        }
        const telegram = notifications.telegram;
        if (isRecord(telegram)) {
            if (typeof telegram.enabled === 'boolean') config.notifications.telegram.enabled = telegram.enabled;
            if (typeof telegram.botToken === 'string') config.notifications.telegram.botToken = telegram.botToken;
            if (typeof telegram.chatId === 'string' || typeof telegram.chatId === 'number') {
                config.notifications.telegram.chatId = String(telegram.chatId);
            }
        }
    }

    const state = loaded.state;
    if (isRecord(state) && (typeof state.persistPath === 'string' || state.persistPath === null)) {
        config.state.persistPath = state.persistPath;
    }

    const logging = loaded.logging;
    if (isRecord(logging) && typeof logging.filePath === 'string') {
        config.logging.filePath = logging.filePath;
    }

    return config;
}

/**
 * Fill empty Telegram credentials from TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID.
 * Telegram is switched on implicitly once both values are known, unless
 * `autoEnable` is false because the file already decided.
 */
export function applyEnvironment(
    config: SentinelConfig,
    env: NodeJS.ProcessEnv = process.env,
    autoEnable = true,
): SentinelConfig {
    const next = cloneConfig(config);
    const telegram = next.notifications.telegram;

    const envToken = env.TELEGRAM_BOT_TOKEN?.trim() ?? '';
    const envChatId = env.TELEGRAM_CHAT_ID?.trim() ?? '';

    if (!telegram.botToken && envToken) telegram.botToken = envToken;
    if (!telegram.chatId && envChatId) telegram.chatId = envChatId;
    if (autoEnable && telegram.botToken && telegram.chatId) {
        telegram.enabled = true;
    }
    return next;
}

/** True when the file sets `notifications.telegram.enabled` itself. */
function setsTelegramSwitch(loaded: unknown): boolean {
    if (!isRecord(loaded) || !isRecord(loaded.notifications)) return false;
    const telegram = loaded.notifications.telegram;
    return isRecord(telegram) && typeof telegram.enabled === 'boolean';
}

function cloneConfig(config: SentinelConfig): SentinelConfig {
    return {
        watch: { ...config.watch, exclude: [...config.watch.exclude] },
        cleaning: { ...config.cleaning },
        notifications: {
            maxSummaryChars: config.notifications.maxSummaryChars,
            telegram: { ...config.notifications.telegram },
        },
        state: { ...config.state },
        logging: { ...config.logging },
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
