import type { CleanResult, MetadataRecord } from '../types/metadata.js';

export const DEFAULT_MAX_SUMMARY_CHARS = 500;
const TRUNCATION_SUFFIX = '... [truncated]';

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');
}

/** Pretty-printed JSON of the record, cut to `maxChars` with a marker when longer. */
export function renderRecord(record: MetadataRecord, maxChars: number = DEFAULT_MAX_SUMMARY_CHARS): string {
    const json = JSON.stringify(record, null, 2);
    // Count code points so a cut never splits a surrogate pair.
    const chars = Array.from(json);
    if (chars.length <= maxChars) return json;
    return `${chars.slice(0, maxChars).join('')}${TRUNCATION_SUFFIX}`;
}

export interface DetectionSummaryInput {
    relativePath: string;
    record: MetadataRecord;
    /** True when the path had a recorded state before this detection. */
    changed: boolean;
    maxChars?: number;
}

/** HTML message announcing newly detected metadata. */
export function formatDetectionSummary(input: DetectionSummaryInput): string {
    const title = input.changed ? '🔄 <b>Metadata changed</b>' : '🔍 <b>New file with metadata</b>';
    const fields = Object.keys(input.record).length;
    return [
        title,
        `📁 ${escapeHtml(input.relativePath)}`,
        `📊 ${fields} field${fields === 1 ? '' : 's'}`,
        `<pre>${escapeHtml(renderRecord(input.record, input.maxChars))}</pre>`,
    ].join('\n');
}

export function formatCleaningSummary(relativePath: string, result: CleanResult): string {
    const target = escapeHtml(relativePath);
    if (result.ok) {
        return `✅ Metadata removed from: ${target}`;
    }
    const reason = result.errorMessage ? `\n${escapeHtml(result.errorMessage)}` : '';
    return `❌ Failed to remove metadata from: ${target}${reason}`;
}

export function formatLifecycleMessage(event: 'started' | 'stopped', directory: string): string {
    const icon = event === 'started' ? '🟢' : '🔴';
    return `${icon} Metadata monitor ${event}: ${escapeHtml(directory)}`;
}
