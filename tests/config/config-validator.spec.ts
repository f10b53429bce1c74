import { describe, expect, it } from 'vitest';
import { formatConfigIssues, validateConfig } from '../../src/config/config-validator.js';
import { mergeWithDefaults } from '../../src/config/json-config.js';

function configWith(overrides: unknown) {
    return mergeWithDefaults(overrides);
}

describe('validateConfig', () => {
    it('accepts a minimal configuration with a directory', () => {
        expect(validateConfig(configWith({ watch: { directory: '/srv/uploads' } }))).toEqual({ ok: true, issues: [] });
    });

    it('requires a directory', () => {
        const result = validateConfig(configWith({}));

        expect(result.ok).toBe(false);
        expect(result.issues.map((i) => i.key)).toEqual(['watch.directory']);
    });

    it('checks the poll interval only in poll mode', () => {
        const event = validateConfig(configWith({ watch: { directory: '/d', intervalSeconds: 0 } }));
        const poll = validateConfig(configWith({ watch: { directory: '/d', mode: 'poll', intervalSeconds: 0 } }));

        expect(event.ok).toBe(true);
        expect(poll.issues.map((i) => [i.key, i.class])).toEqual([['watch.intervalSeconds', 'format_error']]);
    });

    it.each([7, 45, 90])('accepts a %is poll interval', (intervalSeconds) => {
        const result = validateConfig(configWith({ watch: { directory: '/d', mode: 'poll', intervalSeconds } }));

        expect(result).toEqual({ ok: true, issues: [] });
    });

    it('rejects fractional poll intervals', () => {
        const result = validateConfig(configWith({ watch: { directory: '/d', mode: 'poll', intervalSeconds: 2.5 } }));

        expect(result.issues.map((i) => i.key)).toEqual(['watch.intervalSeconds']);
    });

    it('rejects a non-positive summary length', () => {
        const result = validateConfig(configWith({ watch: { directory: '/d' }, notifications: { maxSummaryChars: 0 } }));

        expect(result.issues.map((i) => i.key)).toEqual(['notifications.maxSummaryChars']);
    });

    it('requires Telegram credentials when Telegram is enabled', () => {
        const result = validateConfig(
            configWith({ watch: { directory: '/d' }, notifications: { telegram: { enabled: true } } }),
        );

        expect(result.issues.map((i) => i.key)).toEqual([
            'notifications.telegram.botToken',
            'notifications.telegram.chatId',
        ]);
    });

    it.each(['123456789', '-1001234567890', '@my_channel'])('accepts chat id %s', (chatId) => {
        const result = validateConfig(
            configWith({
                watch: { directory: '/d' },
                notifications: { telegram: { enabled: true, botToken: 'test-secret', chatId } },
            }),
        );

        expect(result.ok).toBe(true);
    });

    it('rejects malformed chat ids without echoing the token', () => {
        const result = validateConfig(
            configWith({
                watch: { directory: '/d' },
                notifications: { telegram: { enabled: true, botToken: 'test-secret', chatId: 'my chat' } },
            }),
        );

        expect(result.issues).toHaveLength(1);
        expect(result.issues[0]?.class).toBe('format_error');
        expect(JSON.stringify(result.issues)).not.toContain('test-secret');
    });
});

describe('formatConfigIssues', () => {
    it('renders one entry per issue with its remediation', () => {
        const text = formatConfigIssues([
            { key: 'a.b', class: 'missing_required', message: 'Missing.', remediation: 'Set it.' },
        ]);

        expect(text).toBe('  - a.b: Missing.\n    → Set it.');
    });
});
