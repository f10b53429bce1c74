import { CliUsageError } from './errors.js';
import type { WatchMode } from '../types/file-watcher.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: metadata-sentinel [command] <folder> [options]

Commands:
  (default)           Watch <folder> and report files carrying metadata
  scan <folder>       Inspect <folder> once, then exit
  doctor              Check that ExifTool and qpdf are available

Options:
  --mode <event|poll>   Use filesystem events (default) or periodic re-scans
  --interval <seconds>  Re-scan period in poll mode (default: 60)
  --clean / --no-clean  Strip metadata from detected files (default: off)
  --token <token>       Telegram bot token (or TELEGRAM_BOT_TOKEN)
  --chat <id>           Telegram chat id (or TELEGRAM_CHAT_ID)
  --exclude <name>      Skip files under a directory of this name (repeatable)
  --config <path>       JSON config file (default: ./metadata-sentinel.json)
  --state-file <path>   Remember reported files across restarts in this JSON file
  --log-file <path>     Append the event log here (default: ./metadata-sentinel.log)
  --json                Machine-readable output (doctor only)
  --help, -h            Show this help message

Examples:
  metadata-sentinel ~/Uploads
  metadata-sentinel ~/Uploads --mode poll --interval 30 --clean
  metadata-sentinel scan ./shared --token 123:abc --chat 987654
  metadata-sentinel doctor --json
`.trim();

// ── Argument model ───────────────────────────────────────────────────────────

export type CliCommand = 'watch' | 'scan' | 'doctor';

/** Values given on the command line; unset fields fall back to the config file. */
export interface CliOverrides {
  directory?: string;
  mode?: WatchMode;
  intervalSeconds?: number;
  cleaning?: boolean;
  botToken?: string;
  chatId?: string;
  exclude?: string[];
  statePath?: string;
  logFilePath?: string;
}

export interface ParsedCli {
  command: CliCommand;
  configPath?: string;
  json: boolean;
  overrides: CliOverrides;
}

const VALUE_FLAGS = new Set([
  '--mode',
  '--interval',
  '--token',
  '--chat',
  '--exclude',
  '--config',
  '--state-file',
  '--log-file',
]);

const BOOLEAN_FLAGS = new Set(['--clean', '--no-clean', '--json']);

/**
 * Parse the arguments after the executable name. Accepts `--flag value` and
 * `--flag=value`. Throws {@link CliUsageError} on anything it does not know.
 */
export function parseCli(argv: readonly string[]): ParsedCli {
  const parsed: ParsedCli = { command: 'watch', json: false, overrides: {} };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    if (BOOLEAN_FLAGS.has(flag)) {
      if (eq !== -1) throw new CliUsageError(`Option '${flag}' does not take a value.`);
      applyBoolean(parsed, flag);
      continue;
    }

    if (!VALUE_FLAGS.has(flag)) {
      throw new CliUsageError(`Unknown option '${flag}'.`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i += 1;
    }
    if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
      throw new CliUsageError(`Option '${flag}' requires a value.`);
    }
    applyValue(parsed, flag, value);
  }

  const first = positionals[0];
  if (first === 'scan' || first === 'doctor') {
    parsed.command = first;
    positionals.shift();
  }

  if (positionals.length > 1) {
    throw new CliUsageError(`Unexpected argument '${positionals[1]}'. Only one folder can be watched.`);
  }
  if (positionals[0] !== undefined) {
    parsed.overrides.directory = positionals[0];
  }

  return parsed;
}

function applyBoolean(parsed: ParsedCli, flag: string): void {
  switch (flag) {
    case '--clean':
      parsed.overrides.cleaning = true;
      break;
    case '--no-clean':
      parsed.overrides.cleaning = false;
      break;
    case '--json':
      parsed.json = true;
      break;
  }
}

function applyValue(parsed: ParsedCli, flag: string, value: string): void {
  const { overrides } = parsed;
  switch (flag) {
    case '--mode':
      if (value !== 'event' && value !== 'poll') {
        throw new CliUsageError(`--mode must be 'event' or 'poll', got '${value}'.`);
      }
      overrides.mode = value;
      break;
    case '--interval': {
      const seconds = Number(value);
      if (!Number.isInteger(seconds) || seconds <= 0) {
        throw new CliUsageError(`--interval must be a positive whole number of seconds, got '${value}'.`);
      }
      overrides.intervalSeconds = seconds;
      break;
    }
    case '--token':
      overrides.botToken = value;
      break;
    case '--chat':
      overrides.chatId = value;
      break;
    case '--exclude':
      overrides.exclude = [...(overrides.exclude ?? []), value];
      break;
    case '--config':
      parsed.configPath = value;
      break;
    case '--state-file':
      overrides.statePath = value;
      break;
    case '--log-file':
      overrides.logFilePath = value;
      break;
  }
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: readonly string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Parse arguments, printing usage errors instead of throwing.
 * Returns `null` and sets a non-zero exit code when the command line is invalid.
 */
export function parseCliOrReport(argv: readonly string[]): ParsedCli | null {
  try {
    return parseCli(argv);
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error;
    console.error(`[metadata-sentinel] ${error.message}`);
    console.error(`Run 'metadata-sentinel --help' to see available options.`);
    process.exitCode = 1;
    return null;
  }
}
