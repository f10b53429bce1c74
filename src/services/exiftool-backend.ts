import { exiftool, type ExifTool } from 'exiftool-vendored';

/** Arguments for reads: family-1 group prefixes, duplicates kept, tag names not descriptions. */
export const READ_ARGS = ['-G1', '-a', '-s'];

/** Arguments for writes: drop every writable tag and replace the file in place. */
export const STRIP_ARGS = ['-all=', '-overwrite_original'];

/** The subset of ExifTool used by the extractor, cleaner and doctor. */
export interface MetadataBackend {
    readTags(filePath: string): Promise<Record<string, unknown>>;
    stripAll(filePath: string): Promise<void>;
    version(): Promise<string>;
    end(): Promise<void>;
}

/**
 * `exiftool-vendored` adapter. The ExifTool process pool is started lazily by
 * the library on first use and must be ended at shutdown.
 */
export class ExifToolBackend implements MetadataBackend {
    readonly #tool: ExifTool;

    constructor(tool: ExifTool = exiftool) {
        this.#tool = tool;
    }

    async readTags(filePath: string): Promise<Record<string, unknown>> {
        const tags = await this.#tool.read(filePath, { readArgs: READ_ARGS });
        const entries: [string, unknown][] = Object.entries(tags);
        return Object.fromEntries(entries);
    }

    async stripAll(filePath: string): Promise<void> {
        await this.#tool.write(filePath, {}, { writeArgs: STRIP_ARGS });
    }

    async version(): Promise<string> {
        return this.#tool.version();
    }

    async end(): Promise<void> {
        await this.#tool.end();
    }
}
