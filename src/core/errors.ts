/** Invalid or incomplete configuration; fatal at start-up. */
export class ConfigError extends Error {
  constructor(message: string, public readonly remediation?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The monitor could not start (directory missing, required tool absent, watcher failure). */
export class StartupError extends Error {
  constructor(message: string, public readonly remediation?: string, public cause?: unknown) {
    super(message);
    this.name = 'StartupError';
  }
}

/** Malformed command line. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}
