import { createHash } from 'node:crypto';
import path from 'node:path';
import type { MetadataRecord, ObservationContext, ObserveResult, SeenState } from '../types/metadata.js';
import type { SeenStateStore } from './seen-state-store.js';
import { InMemorySeenStateStore } from './seen-state-store.js';

/**
 * Order-independent digest of a metadata record: SHA-256 over the JSON of its
 * `[key, value]` pairs sorted by key. The empty record hashes `[]`.
 */
export function fingerprintRecord(record: MetadataRecord): string {
    const pairs = Object.keys(record)
        .sort()
        .map((key) => [key, record[key]]);
    return createHash('sha256').update(JSON.stringify(pairs)).digest('hex');
}

/**
 * Decides whether a file's current metadata has already been seen.
 *
 * A (path, fingerprint) pair is reported as new only when it differs from the
 * last state stored for that path. Observations of the same path are
 * serialized, so callers may run `observe` concurrently.
 */
export class ChangeTracker {
    readonly #store: SeenStateStore;
    readonly #locks = new Map<string, Promise<void>>();

    constructor(store: SeenStateStore = new InMemorySeenStateStore()) {
        this.#store = store;
    }

    async observe(
        filePath: string,
        record: MetadataRecord,
        context: ObservationContext = {},
    ): Promise<ObserveResult> {
        const key = path.resolve(filePath);
        return this.#withLock(key, async () => {
            const fingerprint = fingerprintRecord(record);
            const previous = await this.#store.get(key);

            if (previous && previous.fingerprint === fingerprint) {
                return { isNew: false, fingerprint, previous };
            }

            const next: SeenState = {
                path: key,
                fingerprint,
                fieldCount: Object.keys(record).length,
                mtimeMs: context.mtimeMs ?? null,
                observedAt: new Date().toISOString(),
            };
            await this.#store.set(next);

            return previous ? { isNew: true, fingerprint, previous } : { isNew: true, fingerprint };
        });
    }

    async #withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
        const prior = this.#locks.get(key) ?? Promise.resolve();
        const run = prior.then(task);
        const settled = run.then(
            () => undefined,
            () => undefined,
        );
        this.#locks.set(key, settled);

        try {
            return await run;
        } finally {
            if (this.#locks.get(key) === settled) {
                this.#locks.delete(key);
            }
        }
    }
}
