/**
 * Transcript of analyst conversations, one JSON record per line under the
 * TableTalk home. Each record is a question or a reply about one dataset.
 */

import { appendFile, mkdir, open, readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { config } from '../config/index.js';
import { logger } from './logger.js';

const TranscriptRecordSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
    timestamp: z.number(),
    /** Dataset the message was about (file name). */
    source: z.string().optional(),
});

export type HistoryMessage = z.infer<typeof TranscriptRecordSchema>;

/** Bytes read per step when scanning the file from its end. */
const TAIL_CHUNK_BYTES = 64 * 1024;

/** Valid records among `lines`; blank and malformed lines are skipped. */
function parseLines(lines: readonly string[]): HistoryMessage[] {
    const records: HistoryMessage[] = [];
    for (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed) continue;
        let json: unknown;
        try {
            json = JSON.parse(trimmed);
        } catch {
            logger.debug('Skipping a transcript line that is not JSON', 'History');
            continue;
        }
        const parsed = TranscriptRecordSchema.safeParse(json);
        if (parsed.success) records.push(parsed.data);
    }
    return records;
}

export class HistoryManager {
    private readonly file: string;

    constructor(file?: string) {
        this.file = file || config.analyst.historyPath;
    }

    async append(role: HistoryMessage['role'], content: string, source?: string): Promise<void> {
        const record: HistoryMessage = { role, content, timestamp: Date.now(), ...(source ? { source } : {}) };
        try {
            await mkdir(path.dirname(this.file), { recursive: true });
            await appendFile(this.file, JSON.stringify(record) + '\n', 'utf-8');
        } catch (err) {
            logger.error('Could not write to the transcript', 'History', err);
        }
    }

    async load(): Promise<HistoryMessage[]> {
        if (!existsSync(this.file)) return [];
        try {
            return parseLines((await readFile(this.file, 'utf-8')).split('\n'));
        } catch (err) {
            logger.error('Could not read the transcript', 'History', err);
            return [];
        }
    }

    /** The last `n` records, reading backwards from the end of the file. */
    async loadLast(n: number): Promise<HistoryMessage[]> {
        if (n <= 0 || !existsSync(this.file)) return [];
        try {
            return (await this.tail(n)).slice(-n);
        } catch (err) {
            logger.error('Could not read the transcript', 'History', err);
            return [];
        }
    }

    async clear(): Promise<void> {
        if (!existsSync(this.file)) return;
        try {
            await writeFile(this.file, '', 'utf-8');
        } catch (err) {
            logger.error('Could not clear the transcript', 'History', err);
        }
    }

    private async tail(n: number): Promise<HistoryMessage[]> {
        const handle = await open(this.file, 'r');
        try {
            const { size } = await handle.stat();
            let position = size;
            let text = '';
            let lines: string[] = [];
            while (position > 0 && lines.filter(line => line.trim()).length <= n) {
                const length = Math.min(TAIL_CHUNK_BYTES, position);
                position -= length;
                const chunk = Buffer.alloc(length);
                await handle.read(chunk, 0, length, position);
                text = chunk.toString('utf-8') + text;
                lines = text.split('\n');
            }
            // Unless the whole file was read, the first line may be cut off.
            return parseLines(position > 0 ? lines.slice(1) : lines);
        } finally {
            await handle.close();
        }
    }
}
