/**
 * AnalystSession -- one conversation with the model about one dataset.
 * Owns the message history; callers hold the session object explicitly
 * and start a new one (or reset) when the dataset changes.
 */

import { config } from '../config/index.js';
import { logger } from '../infra/logger.js';
import { PromptBuilder, datasetContextMessage, executionResultsMessage, userRequestMessage } from './prompts/builder.js';
import type { ChatProvider } from './providers.js';
import { parseAnalystResponse } from './response.js';
import type { AnalystResponse, ChatMessage } from './types.js';

export interface SessionOptions {
    /** Conversation turns kept after the system prompt and dataset context. */
    maxHistoryMessages?: number;
    extraInstructions?: string;
}

export class AnalystSession {
    private turns: ChatMessage[] = [];
    private active = false;
    private summaryText: string;
    private readonly systemPrompt: string;
    private readonly maxHistoryMessages: number;

    private constructor(private readonly provider: ChatProvider, summaryText: string, options: SessionOptions) {
        this.summaryText = summaryText;
        this.systemPrompt = new PromptBuilder().build(options.extraInstructions);
        this.maxHistoryMessages = options.maxHistoryMessages ?? config.analyst.maxHistoryMessages;
    }

    static create(provider: ChatProvider, summaryText: string, options: SessionOptions = {}): AnalystSession {
        if (!summaryText.trim()) throw new Error('Data summary must not be empty.');
        return new AnalystSession(provider, summaryText, options);
    }

    get summary(): string {
        return this.summaryText;
    }

    /** Messages as they would be sent next, system prompt first. */
    get messages(): ChatMessage[] {
        return [
            { role: 'system', content: this.systemPrompt },
            { role: 'user', content: datasetContextMessage(this.summaryText) },
            ...this.turns,
        ];
    }

    isFor(summaryText: string): boolean {
        return this.summaryText === summaryText;
    }

    async ask(query: string): Promise<AnalystResponse> {
        if (!query.trim()) throw new Error('User query must not be empty.');
        this.active = true;
        return this.send(userRequestMessage(query));
    }

    /** Second leg of the verification round-trip. */
    async sendExecutionResults(output: string): Promise<AnalystResponse> {
        if (!this.active) throw new Error('No active chat session');
        return this.send(executionResultsMessage(output));
    }

    /** Forget the conversation; optionally switch to another dataset. */
    reset(summaryText?: string): void {
        if (summaryText !== undefined) {
            if (!summaryText.trim()) throw new Error('Data summary must not be empty.');
            this.summaryText = summaryText;
        }
        this.turns = [];
        this.active = false;
        logger.debug('Session reset', 'Session');
    }

    private async send(content: string): Promise<AnalystResponse> {
        const userMessage: ChatMessage = { role: 'user', content };
        const reply = await this.provider.chat([...this.messages, userMessage]);
        this.turns.push(userMessage, { role: 'assistant', content: reply });
        this.trimHistory();
        return parseAnalystResponse(reply);
    }

    private trimHistory(): void {
        while (this.turns.length > this.maxHistoryMessages) this.turns.shift();
        while (this.turns.length > 0 && this.turns[0].role !== 'user') this.turns.shift();
    }
}
