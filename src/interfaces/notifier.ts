import { logEvent } from '../utils/logger.js';
import type { NotifyResult } from '../types/metadata.js';

/** Delivers a human-readable (HTML-formatted) summary to an external channel. */
export interface Notifier {
  readonly channel: string;
  /** Never throws; delivery failures come back as `{ ok: false }`. */
  notify(summaryText: string): Promise<NotifyResult>;
  stop?(): Promise<void>;
}

/** Fallback when no messaging channel is configured: summaries go to the log only. */
export class LogNotifier implements Notifier {
  readonly channel = 'log';

  async notify(summaryText: string): Promise<NotifyResult> {
    await logEvent(`[Notify] ${stripHtml(summaryText)}`);
    return { ok: true };
  }
}

function stripHtml(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, '&');
}
