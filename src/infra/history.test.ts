import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HistoryManager } from './history.js';
import { appendFile, mkdtemp, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import os from 'node:os';

vi.mock('./logger.js', () => ({
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe('HistoryManager', () => {
    let tempDir: string;
    let history: HistoryManager;
    let testFile: string;

    beforeEach(async () => {
        tempDir = await mkdtemp(path.join(os.tmpdir(), 'tabletalk-test-'));
        testFile = path.join(tempDir, 'data', 'history.jsonl');
        history = new HistoryManager(testFile);
    });

    afterEach(async () => {
        if (existsSync(tempDir)) {
            await rm(tempDir, { recursive: true, force: true });
        }
    });

    it('should append and load messages', async () => {
        await history.append('user', 'Hello', 'sales.csv');
        await history.append('assistant', 'Hi there');

        const loaded = await history.load();
        expect(loaded).toHaveLength(2);
        expect(loaded[0]).toMatchObject({ role: 'user', content: 'Hello', source: 'sales.csv' });
        expect(loaded[1].role).toBe('assistant');
        expect(loaded[1].content).toBe('Hi there');
        expect(loaded[1].source).toBeUndefined();
    });

    it('should load last N messages', async () => {
        await history.append('user', '1');
        await history.append('assistant', '2');
        await history.append('user', '3');

        const last2 = await history.loadLast(2);
        expect(last2.map(m => m.content)).toEqual(['2', '3']);

        const all = await history.loadLast(10);
        expect(all.map(m => m.content)).toEqual(['1', '2', '3']);
    });

    it('should skip malformed lines', async () => {
        await history.append('user', 'kept');
        await appendFile(testFile, 'not json\n{"role":"robot","content":"x","timestamp":1}\n');

        expect((await history.load()).map(m => m.content)).toEqual(['kept']);
        expect((await history.loadLast(5)).map(m => m.content)).toEqual(['kept']);
    });

    it('should handle non-existent file gracefully', async () => {
        const loaded = await history.load();
        expect(loaded).toEqual([]);
    });

    it('should clear history', async () => {
        await history.append('user', 'Bye');
        await history.clear();
        const loaded = await history.load();
        expect(loaded).toEqual([]);
    });
});
