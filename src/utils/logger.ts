import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'info' | 'warn' | 'error';

const REDACTED = '[REDACTED]';
const TELEGRAM_TOKEN_PATTERN = /\b\d{6,12}:[A-Za-z0-9_-]{30,}\b/g;
const SENSITIVE_ENV_KEYS = ['TELEGRAM_BOT_TOKEN'];
const MIN_SECRET_LENGTH = 4;

const registeredSecrets = new Set<string>();
let logStream: WriteStream | null = null;
let logFilePath: string | null = null;

/**
 * Register a runtime secret (e.g. a bot token passed on the command line) so
 * it is redacted from every subsequent log line.
 */
export function registerSecret(value: string): void {
    const trimmed = value.trim();
    if (trimmed.length >= MIN_SECRET_LENGTH) {
        registeredSecrets.add(trimmed);
    }
}

/** Redact registered secrets, sensitive env values and bot-token-shaped strings. */
export function scrubSensitiveText(text: string): string {
    const envSecrets = SENSITIVE_ENV_KEYS
        .map((key) => process.env[key]?.trim() ?? '')
        .filter((value) => value.length >= MIN_SECRET_LENGTH);

    // Longest first so a secret containing another is not partially redacted.
    const secrets = [...new Set([...registeredSecrets, ...envSecrets])]
        .sort((a, b) => b.length - a.length);

    let scrubbed = text;
    for (const secret of secrets) {
        scrubbed = scrubbed.split(secret).join(REDACTED);
    }
    return scrubbed.replace(TELEGRAM_TOKEN_PATTERN, REDACTED);
}

export function formatLogLine(level: LogLevel, message: string, at: Date = new Date()): string {
    return `${at.toISOString()} - ${level.toUpperCase()} - ${scrubSensitiveText(message)}`;
}

/**
 * Open the process-wide append-only log file. Lines written before this call
 * only reach the console.
 */
export async function openLog(filePath: string): Promise<void> {
    if (logStream) {
        await closeLog();
    }

    const resolved = path.resolve(filePath);
    await mkdir(path.dirname(resolved), { recursive: true });

    const stream = createWriteStream(resolved, { flags: 'a', encoding: 'utf8' });
    await new Promise<void>((resolve, reject) => {
        stream.once('open', () => resolve());
        stream.once('error', reject);
    });
    stream.on('error', (err) => {
        console.error(`[Logger] Write to ${resolved} failed: ${err.message}`);
    });

    logStream = stream;
    logFilePath = resolved;
}

/** Flush pending writes and close the log file. Safe to call when not open. */
export async function closeLog(): Promise<void> {
    const stream = logStream;
    if (!stream) return;

    logStream = null;
    logFilePath = null;
    await new Promise<void>((resolve) => {
        stream.end(() => resolve());
    });
}

/** Absolute path of the open log file, or `null` when logging to console only. */
export function currentLogPath(): string | null {
    return logFilePath;
}

export async function writeLog(level: LogLevel, message: string): Promise<void> {
    const line = formatLogLine(level, message);

    switch (level) {
        case 'error':
            console.error(line);
            break;
        case 'warn':
            console.warn(line);
            break;
        default:
            console.log(line);
    }

    const stream = logStream;
    if (!stream) return;

    await new Promise<void>((resolve) => {
        stream.write(`${line}\n`, (err) => {
            if (err) {
                console.error(`[Logger] Failed to append log line: ${err.message}`);
            }
            resolve();
        });
    });
}

/** Record an observed event or decision. */
export async function logEvent(message: string): Promise<void> {
    await writeLog('info', message);
}

export async function logWarning(message: string): Promise<void> {
    await writeLog('warn', message);
}

export async function logError(message: string): Promise<void> {
    await writeLog('error', message);
}

/** Record the outcome of an external tool invocation (exiftool, qpdf). */
export async function logToolCall(
    tool: string,
    args: readonly string[],
    outcome: { ok: boolean; detail?: string },
): Promise<void> {
    const status = outcome.ok ? 'ok' : 'failed';
    const detail = outcome.detail ? `: ${outcome.detail}` : '';
    await writeLog(outcome.ok ? 'info' : 'error', `[Tool] ${tool} ${args.join(' ')} -> ${status}${detail}`);
}
