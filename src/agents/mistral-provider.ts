/**
 * Mistral Cloud Backend -- implements the ChatProvider interface using
 * the Mistral AI API (or any OpenAI-compatible endpoint).
 */

import { config } from '../config/index.js';
import { CredentialsError, ModelResponseError, ModelTransportError, getErrorMessage } from '../infra/errors.js';
import { logger } from '../infra/logger.js';
import { ChatResponseSchema, type ChatMessage, type ProviderHealth } from './types.js';
import type { ChatProvider } from './providers.js';

export interface MistralProviderOptions {
    baseUrl?: string;
    apiKey?: string;
    model?: string;
    temperature?: number;
}

export class MistralProvider implements ChatProvider {
    private baseUrl: string;
    private apiKey: string;
    private model: string;
    private temperature: number;

    constructor(options: MistralProviderOptions = {}) {
        this.baseUrl = (options.baseUrl ?? config.llm.baseUrl).replace(/\/$/, '');
        this.apiKey = options.apiKey ?? config.llm.apiKey ?? '';
        this.model = options.model ?? config.llm.model;
        this.temperature = options.temperature ?? config.llm.temperature;
    }

    private getHeaders(): Record<string, string> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (this.apiKey) {
            headers['Authorization'] = `Bearer ${this.apiKey}`;
        }
        return headers;
    }

    async chat(messages: readonly ChatMessage[]): Promise<string> {
        if (!this.apiKey) {
            throw new CredentialsError('MISTRAL_API_KEY is not set. Add it to your environment or .env file.');
        }

        const body = {
            model: this.model,
            messages,
            temperature: this.temperature,
            stream: false,
            response_format: { type: 'json_object' },
        };

        let response: Response;
        try {
            response = await fetch(`${this.baseUrl}/chat/completions`, {
                method: 'POST',
                headers: this.getHeaders(),
                body: JSON.stringify(body),
            });
        } catch (err) {
            throw new ModelTransportError(`Could not reach ${this.baseUrl}: ${getErrorMessage(err)}`, { cause: err });
        }

        if (!response.ok) {
            const errorText = await response.text();
            throw new ModelTransportError(`Mistral API error: ${response.status} - ${errorText}`, { status: response.status });
        }

        let payload: unknown;
        try {
            payload = await response.json();
        } catch (err) {
            throw new ModelResponseError('Failed to parse the chat completion as JSON', { cause: err });
        }

        const parsed = ChatResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new ModelResponseError(`Unexpected chat completion shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
        }

        const choice = parsed.data.choices[0];
        logger.debug(`Reply from ${this.model} (${choice.finish_reason ?? 'no finish reason'})`, 'Mistral');
        return choice.message.content ?? '';
    }

    async healthCheck(): Promise<ProviderHealth> {
        try {
            const res = await fetch(`${this.baseUrl}/models`, {
                method: 'GET',
                headers: this.getHeaders(),
            });
            if (!res.ok) {
                return { ok: false, host: this.baseUrl, model: this.model, status: `HTTP ${res.status}` };
            }
            return { ok: true, host: this.baseUrl, model: this.model };
        } catch (err) {
            return { ok: false, host: this.baseUrl, model: this.model, status: getErrorMessage(err) };
        }
    }
}
