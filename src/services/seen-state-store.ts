import { existsSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import type { SeenState } from '../types/metadata.js';

/** Backing storage for the change tracker's per-path seen states. */
export interface SeenStateStore {
    get(filePath: string): Promise<SeenState | undefined>;
    set(state: SeenState): Promise<void>;
    size(): Promise<number>;
}

/** Process-lifetime store; state is rebuilt from nothing on every start. */
export class InMemorySeenStateStore implements SeenStateStore {
    readonly #states = new Map<string, SeenState>();

    async get(filePath: string): Promise<SeenState | undefined> {
        return this.#states.get(filePath);
    }

    async set(state: SeenState): Promise<void> {
        this.#states.set(state.path, { ...state });
    }

    async size(): Promise<number> {
        return this.#states.size;
    }
}

interface StateFile {
    version: 1;
    states: Record<string, SeenState>;
}

/**
 * JSON-file store so already-reported files stay quiet across restarts.
 * The file is read once, lazily, and rewritten atomically on every change.
 */
export class JsonFileSeenStateStore implements SeenStateStore {
    readonly #filePath: string;
    #states: Map<string, SeenState> | null = null;

    constructor(filePath: string) {
        this.#filePath = path.resolve(filePath);
    }

    get filePath(): string {
        return this.#filePath;
    }

    async get(filePath: string): Promise<SeenState | undefined> {
        const states = await this.#load();
        return states.get(filePath);
    }

    async set(state: SeenState): Promise<void> {
        const states = await this.#load();
        states.set(state.path, { ...state });
        await this.#save(states);
    }

    async size(): Promise<number> {
        const states = await this.#load();
        return states.size;
    }

    async #load(): Promise<Map<string, SeenState>> {
        if (this.#states) return this.#states;

        let raw: string;
        try {
            raw = await fs.readFile(this.#filePath, 'utf-8');
        } catch (error) {
            const fsError = error as NodeJS.ErrnoException;
            if (fsError.code === 'ENOENT') {
                this.#states = new Map();
                return this.#states;
            }
            throw new Error(`Failed to read seen-state file at ${this.#filePath}: ${fsError.message}`);
        }

        this.#states = parseStateFile(raw, this.#filePath);
        return this.#states;
    }

    async #save(states: Map<string, SeenState>): Promise<void> {
        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });

        const payload: StateFile = { version: 1, states: Object.fromEntries(states) };
        const tempPath = `${this.#filePath}.${process.pid}.${Date.now()}.tmp`;
        try {
            await fs.writeFile(tempPath, JSON.stringify(payload, null, 2), 'utf-8');
            await fs.rename(tempPath, this.#filePath);
        } catch (error) {
            if (existsSync(tempPath)) await fs.unlink(tempPath);
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to save seen-state file at ${this.#filePath}: ${message}`);
        }
    }
}

function parseStateFile(raw: string, filePath: string): Map<string, SeenState> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Seen-state file at ${filePath} is not valid JSON: ${message}`);
    }

    const states = new Map<string, SeenState>();
    if (!isRecord(parsed) || !isRecord(parsed.states)) {
        throw new Error(`Seen-state file at ${filePath} has no 'states' object.`);
    }

    for (const [key, value] of Object.entries(parsed.states)) {
        const state = toSeenState(key, value);
        if (state) states.set(key, state);
    }
    return states;
}

function toSeenState(key: string, value: unknown): SeenState | null {
    if (!isRecord(value) || typeof value.fingerprint !== 'string') return null;

    return {
        path: key,
        fingerprint: value.fingerprint,
        fieldCount: typeof value.fieldCount === 'number' ? value.fieldCount : 0,
        mtimeMs: typeof value.mtimeMs === 'number' ? value.mtimeMs : null,
        observedAt: typeof value.observedAt === 'string' ? value.observedAt : new Date(0).toISOString(),
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
