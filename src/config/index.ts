/**
 * Centralized configuration -- loads environment variables and provides
 * typed, defaulted access to all TableTalk settings.
 */

import dotenv from 'dotenv';
import path from 'node:path';
import { readFileSync } from 'node:fs';
import { z } from 'zod';

dotenv.config();

const home = process.env.TABLETALK_HOME || path.join(process.env.HOME || process.env.USERPROFILE || process.cwd(), '.tabletalk');

const PackageSchema = z.object({ version: z.string().optional() });

/** Version from package.json in the working directory, or 0.0.0. */
function readVersion(): string {
    try {
        const pkg = PackageSchema.safeParse(JSON.parse(readFileSync(path.join(process.cwd(), 'package.json'), 'utf-8')));
        return (pkg.success && pkg.data.version) || '0.0.0';
    } catch {
        return '0.0.0';
    }
}

const version = readVersion();

const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevelName = typeof VALID_LOG_LEVELS[number];

/** Parse a positive integer env var, warning and falling back on bad input. */
export function readPositiveInt(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        console.warn(`[Config] Invalid ${name} "${raw}", falling back to ${fallback}.`);
        return fallback;
    }
    return value;
}

function readTemperature(raw: string | undefined): number {
    if (raw === undefined || raw === '') return 0.2;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0 || value > 2) {
        console.warn(`[Config] Invalid LLM_TEMPERATURE "${raw}", falling back to 0.2.`);
        return 0.2;
    }
    return value;
}

function validateLogLevel(raw: string | undefined): LogLevelName {
    const value = raw || 'info';
    const match = VALID_LOG_LEVELS.find(level => level === value);
    if (!match) {
        console.warn(`[Config] Invalid LOG_LEVEL "${value}", falling back to "info". Valid: ${VALID_LOG_LEVELS.join(', ')}`);
        return 'info';
    }
    return match;
}

export const config = {
    version,
    home,

    llm: {
        /** Any OpenAI-compatible endpoint; Mistral's by default. */
        baseUrl: (process.env.LLM_BASE_URL || 'https://api.mistral.ai').replace(/\/$/, '') + '/v1',
        apiKey: process.env.MISTRAL_API_KEY,
        model: process.env.MISTRAL_MODEL || 'mistral-large-latest',
        temperature: readTemperature(process.env.LLM_TEMPERATURE),
    },

    analyst: {
        /** Conversation turns kept in the model context (system messages excluded). */
        maxHistoryMessages: 20,
        historyPath: path.join(home, 'data/history.jsonl'),
    },

    sandbox: {
        /** Wall-clock limit for one execution. */
        timeoutMs: readPositiveInt('SANDBOX_TIMEOUT_MS', process.env.SANDBOX_TIMEOUT_MS, 10_000),
        maxOutputChars: readPositiveInt('SANDBOX_MAX_OUTPUT_CHARS', process.env.SANDBOX_MAX_OUTPUT_CHARS, 20_000),
        /** Stack frames kept in an error report. */
        maxTraceFrames: readPositiveInt('SANDBOX_TRACE_FRAMES', process.env.SANDBOX_TRACE_FRAMES, 4),
        /** Nesting depth the artifact walk descends before giving up on a branch. */
        maxCollectDepth: 32,
    },

    logging: {
        level: validateLogLevel(process.env.LOG_LEVEL),
        silent: process.env.LOG_SILENT === 'true',
    }
} as const;

// Type export for use elsewhere
export type Config = typeof config;
