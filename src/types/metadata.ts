/**
 * Metadata fields extracted from one file at one point in time, keyed by
 * group-qualified tag name (e.g. `IFD0:Make`, `PDF:Author`).
 */
export type MetadataRecord = Readonly<Record<string, string>>;

/** Result of a metadata extraction. `error` is set when the tool failed. */
export interface ExtractionResult {
    record: MetadataRecord;
    error?: string;
}

/** Last-recorded metadata state for one file path. */
export interface SeenState {
    /** Absolute, normalized file path. */
    path: string;
    /** Order-independent SHA-256 digest of the record (hex). */
    fingerprint: string;
    fieldCount: number;
    /** File mtime observed with this state, when known. */
    mtimeMs: number | null;
    /** ISO-8601 timestamp of the observation that produced this state. */
    observedAt: string;
}

/** Extra facts about an observation that are stored but not fingerprinted. */
export interface ObservationContext {
    mtimeMs?: number;
}

export interface ObserveResult {
    isNew: boolean;
    fingerprint: string;
    /** State replaced by this observation; absent on first sighting. */
    previous?: SeenState;
}

export type CleaningTool = 'exiftool' | 'qpdf';

export interface CleanResult {
    ok: boolean;
    /** Tool that produced the final outcome. */
    tool?: CleaningTool;
    errorMessage?: string;
}

export interface NotifyResult {
    ok: boolean;
    errorMessage?: string;
}

export type ProcessOutcome =
    | { status: 'skipped'; path: string; reason: 'missing' | 'not-a-file' | 'shutdown' }
    | { status: 'unchanged'; path: string }
    | { status: 'clear'; path: string; extractionError?: string }
    | {
        status: 'reported';
        path: string;
        record: MetadataRecord;
        notified: boolean;
        /** `null` when cleaning is disabled. */
        cleaning: CleanResult | null;
    };
