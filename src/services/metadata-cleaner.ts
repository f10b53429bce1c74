import path from 'node:path';
import { logToolCall } from '../utils/logger.js';
import { commandErrorCode, createCommandRunner, describeCommandError, type CommandRunner } from '../utils/command.js';
import { STRIP_ARGS, type MetadataBackend } from './exiftool-backend.js';
import type { CleanResult } from '../types/metadata.js';

const QPDF_ARGS = ['--linearize', '--replace-input'];
// qpdf exits 3 when it succeeded with warnings.
const QPDF_WARNINGS_EXIT_CODE = 3;

export interface CleanerOptions {
    /** Whether `qpdf` was found at start-up; enables the PDF fallback. */
    qpdfAvailable: boolean;
    runCommand?: CommandRunner;
}

/**
 * Strips metadata in place. ExifTool is tried first; PDFs fall back to
 * rewriting the document with `qpdf` when ExifTool fails. Never throws and
 * never retries.
 */
export class MetadataCleaner {
    readonly #backend: MetadataBackend;
    readonly #qpdfAvailable: boolean;
    readonly #runCommand: CommandRunner;

    constructor(backend: MetadataBackend, options: CleanerOptions) {
        this.#backend = backend;
        this.#qpdfAvailable = options.qpdfAvailable;
        this.#runCommand = options.runCommand ?? createCommandRunner();
    }

    async clean(filePath: string): Promise<CleanResult> {
        let exiftoolError: string;
        try {
            await this.#backend.stripAll(filePath);
            await logToolCall('exiftool', [...STRIP_ARGS, filePath], { ok: true });
            return { ok: true, tool: 'exiftool' };
        } catch (err) {
            exiftoolError = err instanceof Error ? err.message : String(err);
            await logToolCall('exiftool', [...STRIP_ARGS, filePath], { ok: false, detail: exiftoolError });
        }

        if (path.extname(filePath).toLowerCase() !== '.pdf' || !this.#qpdfAvailable) {
            return { ok: false, tool: 'exiftool', errorMessage: exiftoolError };
        }

        const args = [...QPDF_ARGS, filePath];
        try {
            await this.#runCommand('qpdf', args);
            await logToolCall('qpdf', args, { ok: true });
            return { ok: true, tool: 'qpdf' };
        } catch (err) {
            if (commandErrorCode(err) === QPDF_WARNINGS_EXIT_CODE) {
                await logToolCall('qpdf', args, { ok: true, detail: 'completed with warnings' });
                return { ok: true, tool: 'qpdf' };
            }
            const reason = describeCommandError(err);
            await logToolCall('qpdf', args, { ok: false, detail: reason });
            return { ok: false, tool: 'qpdf', errorMessage: `exiftool: ${exiftoolError}; qpdf: ${reason}` };
        }
    }
}
