import { readdir } from 'node:fs/promises';
import path from 'node:path';
import type { IgnorePredicate } from '../types/file-watcher.js';

const DEFAULT_EXCLUDED_SEGMENTS = ['node_modules', '.git'];

// ExifTool writes through a temp file and, without -overwrite_original, keeps a backup.
const EXIFTOOL_ARTIFACT_SUFFIXES = ['_exiftool_tmp', '_original'];

/**
 * Build the ignore predicate shared by both watch drivers. A path is ignored
 * when any segment below `rootDir` matches an excluded name, or when the file
 * is an ExifTool work file.
 */
export function createIgnorePredicate(rootDir: string, exclude: readonly string[] = []): IgnorePredicate {
    const root = path.resolve(rootDir);
    const excluded = new Set([...DEFAULT_EXCLUDED_SEGMENTS, ...exclude.filter((name) => name.length > 0)]);

    return (absolutePath: string): boolean => {
        const relative = path.relative(root, path.resolve(absolutePath));
        if (relative === '') return false;
        if (relative.startsWith('..') || path.isAbsolute(relative)) return true;

        const segments = relative.split(path.sep);
        if (segments.some((segment) => excluded.has(segment))) return true;

        const base = segments[segments.length - 1] ?? '';
        return EXIFTOOL_ARTIFACT_SUFFIXES.some((suffix) => base.endsWith(suffix));
    };
}

/**
 * Recursively list regular files below `rootDir`, skipping ignored paths.
 * Entries that vanish mid-walk are skipped. Results are sorted for stable
 * processing order.
 */
export async function listFiles(rootDir: string, isIgnored: IgnorePredicate): Promise<string[]> {
    const root = path.resolve(rootDir);
    const files: string[] = [];
    await walk(root, isIgnored, files, true);
    return files.sort();
}

async function walk(dir: string, isIgnored: IgnorePredicate, out: string[], isRoot: boolean): Promise<void> {
    let entries;
    try {
        entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
        const fsError = err as NodeJS.ErrnoException;
        // The root must exist; subdirectories may disappear between listing and reading.
        if (!isRoot && (fsError.code === 'ENOENT' || fsError.code === 'ENOTDIR')) return;
        throw err;
    }

    for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (isIgnored(fullPath)) continue;

        if (entry.isDirectory()) {
            await walk(fullPath, isIgnored, out, false);
        } else if (entry.isFile()) {
            out.push(fullPath);
        }
    }
}
