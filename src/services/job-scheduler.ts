import cron, { type ScheduledTask } from 'node-cron';
import { logEvent, logError } from '../utils/logger.js';
import type { JobConfig, SkippedTickListener } from '../types/scheduler.js';

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask;
    inFlight: Promise<void> | null;
    skippedTicks: number;
}

/**
 * Runs named, repeating background jobs on `node-cron` schedules.
 *
 * A job never overlaps itself: a tick that fires while the previous run is
 * still in flight is dropped and reported to `onSkip` listeners.
 *
 * Usage:
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'directory-poll',
 *   cronExpression: '*\/30 * * * * *',
 *   description: 'Re-scan the watched directory',
 *   handler: async () => { … },
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #skipListeners: Set<SkippedTickListener> = new Set();

    /** Register and start a repeating job. Throws if the ID is taken or the expression is invalid. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: cron.schedule(config.cronExpression, () => this.#onTick(entry)),
            inFlight: null,
            skippedTicks: 0,
        };
        this.#jobs.set(config.id, entry);
        void logEvent(`[JobScheduler] Registered '${config.id}' (${config.description}) on '${config.cronExpression}'.`);
    }

    /** Stop and forget a job. Resolves once any in-flight run has settled. */
    async unregister(jobId: string): Promise<boolean> {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task.stop();
        this.#jobs.delete(jobId);
        await entry.inFlight;
        return true;
    }

    /** Subscribe to dropped ticks. Returns an unsubscribe function. */
    onSkip(listener: SkippedTickListener): () => void {
        this.#skipListeners.add(listener);
        return () => {
            this.#skipListeners.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #onTick(entry: RegisteredJob): void {
        if (entry.inFlight) {
            entry.skippedTicks += 1;
            const tick = { jobId: entry.config.id, timestamp: new Date(), skippedTicks: entry.skippedTicks };
            for (const listener of this.#skipListeners) listener(tick);
            return;
        }

        entry.inFlight = this.#runHandler(entry.config).finally(() => {
            entry.inFlight = null;
        });
    }

    async #runHandler(config: JobConfig): Promise<void> {
        try {
            await config.handler();
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            await logError(`[JobScheduler] Job '${config.id}' failed: ${message}`);
        }
    }
}
