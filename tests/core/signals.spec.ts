import { EventEmitter } from 'node:events';
import { describe, expect, it } from 'vitest';
import { listenForShutdownSignal } from '../../src/core/signals.js';

describe('listenForShutdownSignal', () => {
    it('resolves with the first signal and removes its handlers', async () => {
        const source = new EventEmitter();
        const shutdown = listenForShutdownSignal(source);

        expect(source.listenerCount('SIGINT')).toBe(1);
        expect(source.listenerCount('SIGTERM')).toBe(1);

        source.emit('SIGTERM', 'SIGTERM');

        await expect(shutdown.received).resolves.toBe('SIGTERM');
        expect(source.listenerCount('SIGINT')).toBe(0);
        expect(source.listenerCount('SIGTERM')).toBe(0);
    });

    it('leaves no handlers behind after dispose', () => {
        const source = new EventEmitter();

        listenForShutdownSignal(source).dispose();

        expect(source.listenerCount('SIGINT')).toBe(0);
        expect(source.listenerCount('SIGTERM')).toBe(0);
    });
});
