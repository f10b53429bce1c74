/** A repeating job run on a six-field `node-cron` schedule. */
export interface JobConfig {
  id: string;
  cronExpression: string;
  description: string;
  handler: () => Promise<void>;
}

/** A tick that arrived while the job's previous run was still going. */
export interface SkippedTick {
  jobId: string;
  timestamp: Date;
  /** Ticks dropped for this job since it was registered. */
  skippedTicks: number;
}

export type SkippedTickListener = (tick: SkippedTick) => void;
