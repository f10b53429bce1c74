import { logEvent, logWarning } from '../utils/logger.js';
import type { ExtractionResult, MetadataRecord } from '../types/metadata.js';
import type { MetadataBackend } from './exiftool-backend.js';

/** Family-1 groups describing the file or the tool rather than embedded metadata. */
const NON_EMBEDDED_GROUPS = new Set(['System', 'File', 'Composite', 'ExifTool']);

/** Keys ExifTool adds for bookkeeping. */
const BOOKKEEPING_KEYS = new Set(['SourceFile', 'errors', 'warnings']);

/** Ungrouped names the non-grouped output uses for the same file-level facts. */
const FILE_LEVEL_TAGS = new Set([
    'FileName',
    'Directory',
    'FileSize',
    'FileModifyDate',
    'FileAccessDate',
    'FileInodeChangeDate',
    'FilePermissions',
    'FileType',
    'FileTypeExtension',
    'MIMEType',
    'ExifToolVersion',
]);

/**
 * Tags that describe the file's structure rather than its author or origin.
 * `-all=` cannot remove them, so a stripped file still carries them.
 */
const STRUCTURAL_TAGS: Readonly<Record<string, ReadonlySet<string>>> = {
    PNG: new Set([
        'ImageWidth',
        'ImageHeight',
        'BitDepth',
        'ColorType',
        'Compression',
        'Filter',
        'Interlace',
        'Gamma',
        'SRGBRendering',
        'PixelsPerUnitX',
        'PixelsPerUnitY',
        'PixelUnits',
    ]),
    PDF: new Set(['PDFVersion', 'Linearized', 'PageCount']),
    JFIF: new Set(['JFIFVersion', 'ResolutionUnit', 'XResolution', 'YResolution']),
    GIF: new Set(['GIFVersion', 'ImageWidth', 'ImageHeight', 'HasColorMap', 'ColorResolutionDepth', 'BitsPerPixel', 'BackgroundColor']),
    IFD0: new Set([
        'ImageWidth',
        'ImageHeight',
        'BitsPerSample',
        'Compression',
        'PhotometricInterpretation',
        'StripOffsets',
        'SamplesPerPixel',
        'RowsPerStrip',
        'StripByteCounts',
        'PlanarConfiguration',
    ]),
    QuickTime: new Set(['MajorBrand', 'MinorVersion', 'CompatibleBrands', 'MovieHeaderVersion', 'TimeScale']),
};

/** Whether a raw tag key names embedded metadata worth reporting. */
export function isEmbeddedTag(key: string): boolean {
    if (BOOKKEEPING_KEYS.has(key)) return false;

    const separator = key.indexOf(':');
    if (separator === -1) return !FILE_LEVEL_TAGS.has(key);

    const group = key.slice(0, separator);
    if (NON_EMBEDDED_GROUPS.has(group)) return false;

    return !STRUCTURAL_TAGS[group]?.has(key.slice(separator + 1));
}

/**
 * Render a tag value as text. Dates and other library value objects use their
 * own `toString`; arrays and plain structs are JSON-encoded.
 */
export function stringifyTagValue(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return String(value);
    }
    if (Array.isArray(value)) {
        return JSON.stringify(value.map((item) => stringifyTagValue(item)));
    }
    if (typeof value === 'object') {
        if (value.toString !== Object.prototype.toString) {
            return String(value);
        }
        const entries: [string, unknown][] = Object.entries(value);
        return JSON.stringify(Object.fromEntries(entries.map(([k, v]) => [k, stringifyTagValue(v)])));
    }
    return String(value);
}

/** Keep only embedded-metadata tags and convert their values to text. */
export function toMetadataRecord(tags: Record<string, unknown>): MetadataRecord {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(tags)) {
        if (!isEmbeddedTag(key)) continue;
        record[key] = stringifyTagValue(value);
    }
    return record;
}

/**
 * Reads embedded metadata through the backend. Never throws: a failed read
 * produces an empty record plus the error message.
 */
export class MetadataExtractor {
    readonly #backend: MetadataBackend;

    constructor(backend: MetadataBackend) {
        this.#backend = backend;
    }

    async extract(filePath: string): Promise<ExtractionResult> {
        let tags: Record<string, unknown>;
        try {
            tags = await this.#backend.readTags(filePath);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            await logWarning(`[Extractor] Could not read metadata from ${filePath}: ${message}`);
            return { record: {}, error: message };
        }

        const record = toMetadataRecord(tags);
        const toolErrors = tags.errors;
        if (Array.isArray(toolErrors) && toolErrors.length > 0) {
            const message = toolErrors.map((item) => stringifyTagValue(item)).join('; ');
            await logWarning(`[Extractor] ExifTool reported errors for ${filePath}: ${message}`);
            return { record, error: message };
        }

        await logEvent(`[Extractor] ${filePath}: ${Object.keys(record).length} metadata fields.`);
        return { record };
    }
}
