import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
    applyEnvironment,
    CONFIG_PATH_ENV,
    DEFAULT_CONFIG,
    mergeWithDefaults,
    readConfig,
} from '../../src/config/json-config.js';

describe('Config JSON loading', () => {
    let tempDir: string;
    let tempConfigPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sentinel-config-'));
        tempConfigPath = path.join(tempDir, 'metadata-sentinel.json');
        vi.stubEnv(CONFIG_PATH_ENV, tempConfigPath);
        vi.stubEnv('TELEGRAM_BOT_TOKEN', '');
        vi.stubEnv('TELEGRAM_CHAT_ID', '');
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('loads defaults when the file is missing', async () => {
        await expect(readConfig()).resolves.toEqual(DEFAULT_CONFIG);
    });

    it('fails when an explicitly named file is missing', async () => {
        await expect(readConfig(path.join(tempDir, 'nope.json'))).rejects.toThrow(/Failed to read config file/);
    });

    it('rejects malformed JSON', async () => {
        await fs.writeFile(tempConfigPath, '{ malformed: true ', 'utf8');

        await expect(readConfig()).rejects.toThrow(/Failed to parse config file/);
    });

    it('overlays the file on the defaults', async () => {
        await fs.writeFile(
            tempConfigPath,
            JSON.stringify({
                watch: { directory: '/srv/uploads', mode: 'poll', intervalSeconds: 30, exclude: ['cache', 3] },
                cleaning: { enabled: true },
                notifications: { telegram: { chatId: -1001234 } },
            }),
        );

        const config = await readConfig();

        expect(config.watch).toEqual({ directory: '/srv/uploads', mode: 'poll', intervalSeconds: 30, exclude: ['cache'] });
        expect(config.cleaning.enabled).toBe(true);
        expect(config.notifications.telegram.chatId).toBe('-1001234');
        expect(config.notifications.telegram.enabled).toBe(false);
        expect(config.logging.filePath).toBe('metadata-sentinel.log');
    });

    it('takes Telegram credentials from the environment', async () => {
        vi.stubEnv('TELEGRAM_BOT_TOKEN', 'test-secret');
        vi.stubEnv('TELEGRAM_CHAT_ID', '42');

        const config = await readConfig();

        expect(config.notifications.telegram).toEqual({ enabled: true, botToken: 'test-secret', chatId: '42' });
    });

    it('keeps Telegram off when the file disables it, even with credentials in the environment', async () => {
        vi.stubEnv('TELEGRAM_BOT_TOKEN', 'test-secret');
        vi.stubEnv('TELEGRAM_CHAT_ID', '42');
        await fs.writeFile(tempConfigPath, JSON.stringify({ notifications: { telegram: { enabled: false } } }));

        const config = await readConfig();

        expect(config.notifications.telegram).toEqual({ enabled: false, botToken: 'test-secret', chatId: '42' });
    });
});

describe('mergeWithDefaults', () => {
    it('ignores fields of the wrong type', () => {
        const config = mergeWithDefaults({ watch: { mode: 'inotify', intervalSeconds: '5' }, cleaning: 'yes' });

        expect(config.watch.mode).toBe('event');
        expect(config.watch.intervalSeconds).toBe(60);
        expect(config.cleaning.enabled).toBe(false);
    });

    it('does not share arrays with the defaults', () => {
        const config = mergeWithDefaults(null);
        config.watch.exclude.push('x');

        expect(DEFAULT_CONFIG.watch.exclude).toEqual([]);
    });
});

describe('applyEnvironment', () => {
    it('keeps configured credentials over the environment', () => {
        const base = mergeWithDefaults({ notifications: { telegram: { botToken: 'file-token', chatId: '1' } } });

        const config = applyEnvironment(base, { TELEGRAM_BOT_TOKEN: 'env-token', TELEGRAM_CHAT_ID: '2' });

        expect(config.notifications.telegram).toEqual({ enabled: true, botToken: 'file-token', chatId: '1' });
    });

    it('leaves Telegram off when only the token is known', () => {
        const config = applyEnvironment(DEFAULT_CONFIG, { TELEGRAM_BOT_TOKEN: 'env-token' });

        expect(config.notifications.telegram.enabled).toBe(false);
        expect(config.notifications.telegram.botToken).toBe('env-token');
    });

    it('fills credentials without switching Telegram on when auto-enable is off', () => {
        const config = applyEnvironment(DEFAULT_CONFIG, { TELEGRAM_BOT_TOKEN: 'env-token', TELEGRAM_CHAT_ID: '2' }, false);

        expect(config.notifications.telegram).toEqual({ enabled: false, botToken: 'env-token', chatId: '2' });
    });
});
