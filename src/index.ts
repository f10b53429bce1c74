#!/usr/bin/env node
import { handleHelpCli, parseCliOrReport, type ParsedCli } from './core/cli.js';
import { doctorExitCode, formatDoctorReport, runDoctorChecks } from './core/doctor.js';
import { ConfigError, StartupError } from './core/errors.js';
import { applyCliOverrides, MetadataSentinel } from './core/sentinel.js';
import { listenForShutdownSignal } from './core/signals.js';
import { readConfig, type SentinelConfig } from './config/json-config.js';
import { ExifToolBackend } from './services/exiftool-backend.js';
import { createCommandRunner } from './utils/command.js';
import { closeLog, logError, logEvent, openLog, registerSecret } from './utils/logger.js';

async function loadSettings(cli: ParsedCli): Promise<SentinelConfig> {
    const fileConfig = await readConfig(cli.configPath);
    return applyCliOverrides(fileConfig, cli.overrides);
}

async function runDoctor(cli: ParsedCli, config: SentinelConfig): Promise<number> {
    const backend = new ExifToolBackend();
    try {
        const telegram = config.notifications.telegram;
        const report = await runDoctorChecks({
            backend,
            runCommand: createCommandRunner(),
            directory: config.watch.directory || undefined,
            telegramConfigured: telegram.enabled && telegram.botToken !== '' && telegram.chatId !== '',
        });
        console.log(formatDoctorReport(report, cli.json));
        return doctorExitCode(report);
    } finally {
        await backend.end();
    }
}

async function runSentinel(cli: ParsedCli, config: SentinelConfig): Promise<number> {
    await openLog(config.logging.filePath);
    const shutdownSignal = listenForShutdownSignal();

    let sentinel: MetadataSentinel;
    try {
        sentinel = await MetadataSentinel.create(config);
    } catch (error) {
        shutdownSignal.dispose();
        await reportStartupFailure(error);
        return 1;
    }

    const work: Promise<unknown> = cli.command === 'scan' ? sentinel.runOnce() : sentinel.start();
    try {
        const interrupted = await Promise.race([work.then(() => null), shutdownSignal.received]);
        const signal = interrupted ?? (cli.command === 'scan' ? null : await shutdownSignal.received);
        if (signal) await logEvent(`[metadata-sentinel] Received ${signal}, stopping.`);
        if (interrupted) {
            // Stops the driver and queue, so the interrupted scan settles.
            await sentinel.shutdown();
            await work;
        }
        return 0;
    } catch (error) {
        await reportStartupFailure(error);
        return 1;
    } finally {
        shutdownSignal.dispose();
        await sentinel.shutdown();
    }
}

async function reportStartupFailure(error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    await logError(`[metadata-sentinel] Startup failed: ${message}`);
    if ((error instanceof ConfigError || error instanceof StartupError) && error.remediation) {
        await logError(`[metadata-sentinel] → ${error.remediation}`);
    }
}

async function main(argv: string[]): Promise<number> {
    if (handleHelpCli(argv)) return 0;

    const cli = parseCliOrReport(argv);
    if (!cli) return 1;

    if (cli.overrides.botToken) registerSecret(cli.overrides.botToken);

    let config: SentinelConfig;
    try {
        config = await loadSettings(cli);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[metadata-sentinel] ${message}`);
        return 1;
    }

    if (cli.command === 'doctor') {
        return runDoctor(cli, config);
    }

    try {
        return await runSentinel(cli, config);
    } finally {
        await closeLog();
    }
}

main(process.argv.slice(2)).then(
    (code) => {
        process.exit(code);
    },
    (error: unknown) => {
        console.error('[metadata-sentinel] Fatal error:', error);
        process.exit(1);
    },
);
