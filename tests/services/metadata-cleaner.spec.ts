import { describe, expect, it, vi } from 'vitest';
import { MetadataCleaner } from '../../src/services/metadata-cleaner.js';
import type { MetadataBackend } from '../../src/services/exiftool-backend.js';
import type { CommandRunner } from '../../src/utils/command.js';

vi.mock('../../src/utils/logger.js', () => ({
    logToolCall: vi.fn().mockResolvedValue(undefined),
}));

function backend(stripAll: MetadataBackend['stripAll']): MetadataBackend {
    return {
        readTags: vi.fn().mockResolvedValue({}),
        stripAll,
        version: vi.fn().mockResolvedValue('12.76'),
        end: vi.fn().mockResolvedValue(undefined),
    };
}

function execFailure(message: string, extra: { code?: number | string; stderr?: string }): Error {
    return Object.assign(new Error(message), extra);
}

describe('MetadataCleaner', () => {
    it('strips with ExifTool when it succeeds', async () => {
        const stripAll = vi.fn().mockResolvedValue(undefined);
        const runCommand = vi.fn<CommandRunner>();
        const cleaner = new MetadataCleaner(backend(stripAll), { qpdfAvailable: true, runCommand });

        await expect(cleaner.clean('/data/photo.jpg')).resolves.toEqual({ ok: true, tool: 'exiftool' });
        expect(stripAll).toHaveBeenCalledWith('/data/photo.jpg');
        expect(runCommand).not.toHaveBeenCalled();
    });

    it('reports the ExifTool error for non-PDF files without retrying', async () => {
        const stripAll = vi.fn().mockRejectedValue(new Error('Not a valid JPEG'));
        const runCommand = vi.fn<CommandRunner>();
        const cleaner = new MetadataCleaner(backend(stripAll), { qpdfAvailable: true, runCommand });

        await expect(cleaner.clean('/data/photo.jpg')).resolves.toEqual({
            ok: false,
            tool: 'exiftool',
            errorMessage: 'Not a valid JPEG',
        });
        expect(stripAll).toHaveBeenCalledTimes(1);
        expect(runCommand).not.toHaveBeenCalled();
    });

    it('falls back to qpdf for PDFs', async () => {
        const runCommand = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: '' });
        const cleaner = new MetadataCleaner(
            backend(vi.fn().mockRejectedValue(new Error('PDF is encrypted'))),
            { qpdfAvailable: true, runCommand },
        );

        await expect(cleaner.clean('/docs/Report.PDF')).resolves.toEqual({ ok: true, tool: 'qpdf' });
        expect(runCommand).toHaveBeenCalledWith('qpdf', ['--linearize', '--replace-input', '/docs/Report.PDF']);
    });

    it('treats qpdf exit code 3 as success with warnings', async () => {
        const runCommand = vi.fn<CommandRunner>().mockRejectedValue(execFailure('Command failed', { code: 3 }));
        const cleaner = new MetadataCleaner(
            backend(vi.fn().mockRejectedValue(new Error('write failed'))),
            { qpdfAvailable: true, runCommand },
        );

        await expect(cleaner.clean('/docs/a.pdf')).resolves.toEqual({ ok: true, tool: 'qpdf' });
    });

    it('combines both errors when qpdf also fails', async () => {
        const runCommand = vi
            .fn<CommandRunner>()
            .mockRejectedValue(execFailure('Command failed', { code: 2, stderr: 'qpdf: file is damaged\n' }));
        const cleaner = new MetadataCleaner(
            backend(vi.fn().mockRejectedValue(new Error('write failed'))),
            { qpdfAvailable: true, runCommand },
        );

        await expect(cleaner.clean('/docs/a.pdf')).resolves.toEqual({
            ok: false,
            tool: 'qpdf',
            errorMessage: 'exiftool: write failed; qpdf: qpdf: file is damaged',
        });
    });

    it('skips the qpdf fallback when qpdf is unavailable', async () => {
        const runCommand = vi.fn<CommandRunner>();
        const cleaner = new MetadataCleaner(
            backend(vi.fn().mockRejectedValue(new Error('write failed'))),
            { qpdfAvailable: false, runCommand },
        );

        const result = await cleaner.clean('/docs/a.pdf');

        expect(result.ok).toBe(false);
        expect(result.errorMessage).toBe('write failed');
        expect(runCommand).not.toHaveBeenCalled();
    });
});
