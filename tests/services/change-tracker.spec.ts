import { describe, expect, it } from 'vitest';
import path from 'node:path';
import { ChangeTracker, fingerprintRecord } from '../../src/services/change-tracker.js';
import { InMemorySeenStateStore, type SeenStateStore } from '../../src/services/seen-state-store.js';
import type { SeenState } from '../../src/types/metadata.js';

describe('fingerprintRecord', () => {
    it('ignores insertion order', () => {
        const a = { GPSLatitude: '40.7', Author: 'Jane', Make: 'Canon' };
        const b = { Make: 'Canon', Author: 'Jane', GPSLatitude: '40.7' };

        expect(fingerprintRecord(a)).toBe(fingerprintRecord(b));
    });

    it('distinguishes different values for the same keys', () => {
        expect(fingerprintRecord({ Author: 'Jane' })).not.toBe(fingerprintRecord({ Author: 'John' }));
    });

    it('gives the empty record a stable digest distinct from any field', () => {
        const empty = fingerprintRecord({});

        expect(empty).toBe(fingerprintRecord({}));
        expect(empty).toMatch(/^[0-9a-f]{64}$/);
        expect(empty).not.toBe(fingerprintRecord({ '': '' }));
    });

    it('does not confuse keys and values that concatenate alike', () => {
        expect(fingerprintRecord({ ab: 'c' })).not.toBe(fingerprintRecord({ a: 'bc' }));
    });
});

describe('ChangeTracker', () => {
    it('reports the same record as new once, then as seen', async () => {
        const tracker = new ChangeTracker();
        const record = { 'IFD0:Make': 'Canon' };

        expect((await tracker.observe('/data/a.jpg', record)).isNew).toBe(true);
        expect((await tracker.observe('/data/a.jpg', record)).isNew).toBe(false);
    });

    it('reports each distinct record as new', async () => {
        const tracker = new ChangeTracker();

        expect((await tracker.observe('/data/a.jpg', { Author: 'A' })).isNew).toBe(true);
        expect((await tracker.observe('/data/a.jpg', { Author: 'B' })).isNew).toBe(true);
    });

    it('reports a return to an earlier record as new again', async () => {
        const tracker = new ChangeTracker();

        await tracker.observe('/data/a.jpg', { Author: 'A' });
        await tracker.observe('/data/a.jpg', { Author: 'B' });
        const back = await tracker.observe('/data/a.jpg', { Author: 'A' });
        const repeat = await tracker.observe('/data/a.jpg', { Author: 'A' });

        expect(back.isNew).toBe(true);
        expect(repeat.isNew).toBe(false);
    });

    it('reports a transition to the empty record exactly once', async () => {
        const tracker = new ChangeTracker();

        await tracker.observe('/data/a.jpg', { Author: 'A' });
        const cleared = await tracker.observe('/data/a.jpg', {});
        const again = await tracker.observe('/data/a.jpg', {});

        expect(cleared.isNew).toBe(true);
        expect(cleared.previous?.fieldCount).toBe(1);
        expect(again.isNew).toBe(false);
    });

    it('follows a photo through detection, reordering and cleaning', async () => {
        const tracker = new ChangeTracker();

        const first = await tracker.observe('photo.jpg', { GPSLatitude: '40.7', Author: 'Jane' });
        const reordered = await tracker.observe('photo.jpg', { Author: 'Jane', GPSLatitude: '40.7' });
        const cleaned = await tracker.observe('photo.jpg', {});

        expect(first.isNew).toBe(true);
        expect(first.previous).toBeUndefined();
        expect(reordered.isNew).toBe(false);
        expect(cleaned.isNew).toBe(true);
    });

    it('tracks paths independently even when metadata is identical', async () => {
        const tracker = new ChangeTracker();
        const record = { Author: 'Jane' };

        expect((await tracker.observe('/data/one.pdf', record)).isNew).toBe(true);
        expect((await tracker.observe('/data/two.pdf', record)).isNew).toBe(true);
    });

    it('normalizes paths before lookup', async () => {
        const tracker = new ChangeTracker();

        await tracker.observe('/data/sub/../a.jpg', { Author: 'A' });
        const result = await tracker.observe('/data/a.jpg', { Author: 'A' });

        expect(result.isNew).toBe(false);
    });

    it('records field count and mtime in the seen state', async () => {
        const store = new InMemorySeenStateStore();
        const tracker = new ChangeTracker(store);

        const result = await tracker.observe('/data/a.jpg', { A: '1', B: '2' }, { mtimeMs: 1234 });
        const state = await store.get(path.resolve('/data/a.jpg'));

        expect(state).toMatchObject({
            path: path.resolve('/data/a.jpg'),
            fingerprint: result.fingerprint,
            fieldCount: 2,
            mtimeMs: 1234,
        });
    });

    it('does not rewrite the store for an unchanged record', async () => {
        const writes: SeenState[] = [];
        const inner = new InMemorySeenStateStore();
        const store: SeenStateStore = {
            get: (p) => inner.get(p),
            size: () => inner.size(),
            set: async (state) => {
                writes.push(state);
                await inner.set(state);
            },
        };
        const tracker = new ChangeTracker(store);

        await tracker.observe('/data/a.jpg', { A: '1' });
        await tracker.observe('/data/a.jpg', { A: '1' });

        expect(writes).toHaveLength(1);
    });

    it('reports a concurrent duplicate observation as new only once', async () => {
        const inner = new InMemorySeenStateStore();
        const slowStore: SeenStateStore = {
            get: async (p) => {
                await new Promise((resolve) => setTimeout(resolve, 5));
                return inner.get(p);
            },
            set: (state) => inner.set(state),
            size: () => inner.size(),
        };
        const tracker = new ChangeTracker(slowStore);
        const record = { Author: 'Jane' };

        const results = await Promise.all([
            tracker.observe('/data/a.jpg', record),
            tracker.observe('/data/a.jpg', record),
            tracker.observe('/data/a.jpg', record),
        ]);

        expect(results.map((r) => r.isNew)).toEqual([true, false, false]);
    });
});
