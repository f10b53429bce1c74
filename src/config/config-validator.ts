/**
 * Structural validation of the merged runtime configuration.
 *
 * Issues are redaction-safe: they name the offending key but never echo
 * secret values.
 */

import { isValidInterval } from '../services/polling-watcher.js';
import type { SentinelConfig } from './json-config.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  /** Dotted config key, e.g. `watch.intervalSeconds`. */
  key: string;
  class: ConfigIssueClass;
  message: string;
  /** Actionable remediation hint (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  issues: ConfigIssue[];
}

// ── Validation ───────────────────────────────────────────────────────────────

export function validateConfig(config: SentinelConfig): ConfigValidationResult {
  const issues: ConfigIssue[] = [];

  if (config.watch.directory.trim() === '') {
    issues.push({
      key: 'watch.directory',
      class: 'missing_required',
      message: 'No directory to watch was given.',
      remediation: 'Pass the folder as the first argument or set watch.directory in the config file.',
    });
  }

  if (config.watch.mode === 'poll' && !isValidInterval(config.watch.intervalSeconds)) {
    issues.push({
      key: 'watch.intervalSeconds',
      class: 'format_error',
      message: `Polling interval must be a positive whole number of seconds, got ${config.watch.intervalSeconds}.`,
      remediation: 'Set watch.intervalSeconds (or --interval) to e.g. 30.',
    });
  }

  const maxChars = config.notifications.maxSummaryChars;
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    issues.push({
      key: 'notifications.maxSummaryChars',
      class: 'format_error',
      message: `maxSummaryChars must be a positive integer, got ${maxChars}.`,
      remediation: 'Set notifications.maxSummaryChars to e.g. 500.',
    });
  }

  const telegram = config.notifications.telegram;
  if (telegram.enabled) {
    if (telegram.botToken.trim() === '') {
      issues.push({
        key: 'notifications.telegram.botToken',
        class: 'missing_required',
        message: 'Telegram is enabled but no bot token is configured.',
        remediation: 'Pass --token, set TELEGRAM_BOT_TOKEN, or disable Telegram notifications.',
      });
    }
    if (telegram.chatId.trim() === '') {
      issues.push({
        key: 'notifications.telegram.chatId',
        class: 'missing_required',
        message: 'Telegram is enabled but no chat id is configured.',
        remediation: 'Pass --chat or set TELEGRAM_CHAT_ID.',
      });
    } else if (!/^-?\d+$|^@\w+$/.test(telegram.chatId.trim())) {
      issues.push({
        key: 'notifications.telegram.chatId',
        class: 'format_error',
        message: `Telegram chat id '${telegram.chatId.trim()}' is neither numeric nor an @channel name.`,
        remediation: 'Use the numeric chat id (e.g. 123456789 or -1001234567890) or @channelusername.',
      });
    }
  }

  if (config.logging.filePath.trim() === '') {
    issues.push({
      key: 'logging.filePath',
      class: 'missing_required',
      message: 'Log file path is empty.',
      remediation: 'Set logging.filePath or pass --log-file.',
    });
  }

  return { ok: issues.length === 0, issues };
}

export function formatConfigIssues(issues: readonly ConfigIssue[]): string {
  return issues
    .map((issue) => `  - ${issue.key}: ${issue.message}\n    → ${issue.remediation}`)
    .join('\n');
}
