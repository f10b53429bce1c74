import { access, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import path from 'node:path';
import { describeCommandError, type CommandRunner } from '../utils/command.js';
import type { MetadataBackend } from '../services/exiftool-backend.js';
import type {
    DoctorCheck,
    DoctorCheckResult,
    DoctorReport,
    DoctorStatus,
} from '../types/doctor.js';

export interface ToolStatus {
    available: boolean;
    version?: string;
    error?: string;
}

export interface ToolAvailability {
    exiftool: ToolStatus;
    qpdf: ToolStatus;
}

/** Probe ExifTool (through the backend) and qpdf (on PATH). Never throws. */
export async function detectTools(backend: MetadataBackend, runCommand: CommandRunner): Promise<ToolAvailability> {
    const [exiftool, qpdf] = await Promise.all([
        backend.version().then(
            (version): ToolStatus => ({ available: true, version: version.trim() }),
            (err: unknown): ToolStatus => ({
                available: false,
                error: err instanceof Error ? err.message : String(err),
            }),
        ),
        runCommand('qpdf', ['--version']).then(
            (output): ToolStatus => ({ available: true, version: firstLine(output.stdout) }),
            (err: unknown): ToolStatus => ({ available: false, error: describeCommandError(err) }),
        ),
    ]);
    return { exiftool, qpdf };
}

export interface DoctorDeps {
    backend: MetadataBackend;
    runCommand: CommandRunner;
    /** Watched directory, when one was given. */
    directory?: string;
    telegramConfigured: boolean;
}

const CHECKS = {
    exiftool: {
        kind: 'binary',
        name: 'ExifTool',
        description: 'Reads and strips embedded metadata.',
        severity: 'critical',
        remediation: 'Install Perl (ExifTool ships with exiftool-vendored) or set EXIFTOOL_PATH.',
    },
    qpdf: {
        kind: 'binary',
        name: 'qpdf',
        description: 'Fallback PDF cleaner when ExifTool cannot rewrite a PDF.',
        severity: 'warning',
        remediation: 'Install qpdf (e.g. `apt install qpdf` or `brew install qpdf`).',
    },
    directory: {
        kind: 'filesystem',
        name: 'Watched directory',
        description: 'The folder to monitor exists and is readable.',
        severity: 'critical',
        remediation: 'Create the folder or pass the correct path.',
    },
    telegram: {
        kind: 'messaging',
        name: 'Telegram',
        description: 'Bot token and chat id for notifications.',
        severity: 'warning',
        remediation: 'Pass --token/--chat or set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID; reports go to the log otherwise.',
    },
} satisfies Record<string, DoctorCheck>;

export async function runDoctorChecks(deps: DoctorDeps): Promise<DoctorReport> {
    const tools = await detectTools(deps.backend, deps.runCommand);
    const results: DoctorCheckResult[] = [
        toolResult(CHECKS.exiftool, tools.exiftool),
        toolResult(CHECKS.qpdf, tools.qpdf),
    ];

    if (deps.directory !== undefined) {
        results.push(await directoryResult(deps.directory));
    }

    results.push({
        check: CHECKS.telegram,
        passed: deps.telegramConfigured,
        message: deps.telegramConfigured ? 'Telegram notifications configured.' : 'Telegram not configured.',
    });

    return buildReport(results);
}

export function buildReport(results: DoctorCheckResult[]): DoctorReport {
    const failed = results.filter((r) => !r.passed);
    let status: DoctorStatus = 'ok';
    if (failed.some((r) => r.check.severity === 'critical')) {
        status = 'critical';
    } else if (failed.some((r) => r.check.severity === 'warning')) {
        status = 'degraded';
    }

    return {
        status,
        results,
        checkedAt: new Date().toISOString(),
        passed: results.length - failed.length,
        failed: failed.length,
    };
}

export function formatDoctorReport(report: DoctorReport, asJson = false): string {
    if (asJson) return JSON.stringify(report, null, 2);

    const lines = [`metadata-sentinel doctor: ${report.status.toUpperCase()} (${report.passed} passed, ${report.failed} failed)`];
    for (const result of report.results) {
        const mark = result.passed ? '✔' : result.check.severity === 'critical' ? '✖' : '!';
        const actual = result.actual ? ` [${result.actual}]` : '';
        lines.push(`  ${mark} ${result.check.name}: ${result.message}${actual}`);
        if (!result.passed) {
            lines.push(`      → ${result.check.remediation}`);
        }
    }
    return lines.join('\n');
}

/** Exit code for a report: 0 ok, 1 degraded, 2 critical. */
export function doctorExitCode(report: DoctorReport): number {
    if (report.status === 'critical') return 2;
    if (report.status === 'degraded') return 1;
    return 0;
}

// ── Individual Checks ────────────────────────────────────────────────────────

function toolResult(check: DoctorCheck, status: ToolStatus): DoctorCheckResult {
    if (status.available) {
        return { check, passed: true, actual: status.version, message: `${check.name} is available.` };
    }
    return { check, passed: false, message: `${check.name} is unavailable: ${status.error ?? 'unknown error'}.` };
}

async function directoryResult(directory: string): Promise<DoctorCheckResult> {
    const resolved = path.resolve(directory);
    try {
        const stats = await stat(resolved);
        if (!stats.isDirectory()) {
            return { check: CHECKS.directory, passed: false, actual: resolved, message: 'Path is not a directory.' };
        }
        await access(resolved, constants.R_OK);
        return { check: CHECKS.directory, passed: true, actual: resolved, message: 'Directory is readable.' };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { check: CHECKS.directory, passed: false, actual: resolved, message };
    }
}

function firstLine(text: string): string {
    return text.split(/\r?\n/, 1)[0]?.trim() ?? '';
}
