/**
 * Tests for PromptBuilder -- system prompt and framing messages.
 */

import { describe, it, expect } from 'vitest';
import { PromptBuilder, datasetContextMessage, executionResultsMessage, userRequestMessage } from './builder.js';

describe('PromptBuilder', () => {
    it('lists every name the sandbox provides', () => {
        const prompt = new PromptBuilder().build();
        expect(prompt).toContain('print, tables, stats, charts, df, Array, Boolean');
    });

    it('describes the JSON contract and the verification flow', () => {
        const prompt = new PromptBuilder().build();
        expect(prompt).toContain('"needs_verification": false');
        expect(prompt).toContain('## VERIFICATION');
    });

    it('includes extra instructions when provided', () => {
        const prompt = new PromptBuilder().build('Answer in French.');
        expect(prompt).toContain('## ADDITIONAL INSTRUCTIONS\nAnswer in French.');
    });

    it('omits the extra section when no instructions are given', () => {
        expect(new PromptBuilder().build()).not.toContain('ADDITIONAL INSTRUCTIONS');
    });
});

describe('framing messages', () => {
    it('wraps the dataset summary', () => {
        expect(datasetContextMessage('Dataset with 2 rows and 1 columns.')).toBe(
            "Dataset summary:\nDataset with 2 rows and 1 columns.\n\nI'm ready to analyze this data. What would you like to know?",
        );
    });

    it('wraps requests and execution output', () => {
        expect(userRequestMessage('Top region?')).toBe('User request: Top region?');
        expect(executionResultsMessage('north')).toBe(
            'Execution results:\n```\nnorth\n```\n\nNow provide the complete analysis based on these results.',
        );
    });
});
