/** How file paths are discovered. */
export type WatchMode = 'event' | 'poll';

/** Why a path was emitted. Informational only; the pipeline treats all alike. */
export type FileEventType = 'initial' | 'add' | 'change' | 'scan';

/** Normalized file-path event handed to the pipeline. */
export interface FileEvent {
    type: FileEventType;
    /** Absolute path of the affected file. */
    path: string;
    /** ISO-8601 timestamp when the event was detected. */
    timestamp: string;
}

/** Callback invoked for every emitted file path. */
export type FileEventListener = (event: FileEvent) => Promise<void> | void;

/** Returns true when a path (absolute) must not be emitted. */
export type IgnorePredicate = (absolutePath: string) => boolean;

/** Configuration for the watched directory. */
export interface WatchTarget {
    /** Absolute path to the directory to monitor. */
    directory: string;
    /** Path segment names to exclude (e.g. 'cache', '.thumbnails'). */
    exclude?: string[];
}

/**
 * One capability with two implementations: produces the file paths that
 * should be inspected, either from filesystem events or by re-listing the
 * directory on an interval.
 */
export interface WatchDriver {
    readonly mode: WatchMode;
    start(listener: FileEventListener): Promise<void>;
    stop(): Promise<void>;
}
