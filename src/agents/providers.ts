/**
 * LLM provider interface and re-exports.
 * The concrete implementation lives in mistral-provider.ts.
 */

import type { ChatMessage, ProviderHealth } from './types.js';

/** Interface that all LLM backends must implement. */
export interface ChatProvider {
    /** Send the whole conversation; resolves with the assistant's reply text. */
    chat(messages: readonly ChatMessage[]): Promise<string>;
    healthCheck(): Promise<ProviderHealth>;
}

export { MistralProvider } from './mistral-provider.js';
