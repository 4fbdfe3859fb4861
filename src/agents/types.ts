/**
 * Shared type definitions for the OpenAI-compatible chat completions API
 * and the structured replies the analyst expects from the model.
 */

import { z } from 'zod';

/** Message in OpenAI format. */
export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

/** The slice of a `/chat/completions` response the provider reads. */
export const ChatResponseSchema = z.object({
    id: z.string().optional(),
    model: z.string().optional(),
    choices: z.array(z.object({
        index: z.number().optional(),
        message: z.object({
            role: z.string().optional(),
            content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
    })).min(1),
});

export type ChatResponse = z.infer<typeof ChatResponseSchema>;

/** Reachability report for the model endpoint. */
export interface ProviderHealth {
    ok: boolean;
    host: string;
    model: string;
    status?: string;
}

/** Parsed model reply. */
export interface AnalystResponse {
    analysis: string;
    code: string;
    suggestions: string;
    /** The code only gathers facts; run it and send the output back before answering. */
    needsVerification: boolean;
}
