/**
 * Per-run print buffer. Keeps the first and last halves of the budget once
 * output outgrows it, so both the opening results and the final lines
 * survive a chatty loop.
 */

import { inspect } from 'node:util';

/** How a printed value is rendered. Strings print raw, like console.log. */
export function formatValue(value: unknown): string {
    if (typeof value === 'string') return value;
    return inspect(value, { depth: 4, breakLength: 100 });
}

export class ConsoleCapture {
    private readonly headLimit: number;
    private readonly tailLimit: number;
    private head = '';
    private tail = '';
    private total = 0;

    constructor(private readonly maxChars: number) {
        this.headLimit = Math.ceil(maxChars / 2);
        this.tailLimit = maxChars - this.headLimit;
    }

    /** Same contract as console.log: space-separated values, one line. */
    print(...values: unknown[]): void {
        this.write(values.map(formatValue).join(' ') + '\n');
    }

    write(chunk: string): void {
        this.total += chunk.length;
        const room = this.headLimit - this.head.length;
        if (room > 0) {
            this.head += chunk.slice(0, room);
            chunk = chunk.slice(room);
        }
        if (chunk.length === 0) return;
        this.tail += chunk;
        if (this.tail.length > this.tailLimit * 2) this.tail = this.tail.slice(-this.tailLimit);
    }

    get truncated(): boolean {
        return this.total > this.maxChars;
    }

    text(): string {
        if (!this.truncated) return this.head + this.tail;
        const tail = this.tailLimit > 0 ? this.tail.slice(-this.tailLimit) : '';
        const dropped = this.total - this.head.length - tail.length;
        return `${this.head}\n\n[... truncated ${dropped} characters ...]\n\n${tail}`;
    }
}
