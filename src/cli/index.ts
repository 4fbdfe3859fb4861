#!/usr/bin/env node
/**
 * TableTalk CLI -- `summary`, `run`, `ask` and `chat` against one CSV file,
 * plus `health` and `history` for the model endpoint and the transcript.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { createInterface } from 'node:readline';
import { MistralProvider } from '../agents/providers.js';
import type { Figure } from '../charts/figure.js';
import { config } from '../config/index.js';
import { loadCsv } from '../data/csv.js';
import { summarizeDataset } from '../data/summary.js';
import { printBanner, printHint, printStatus } from '../infra/banner.js';
import { getErrorMessage } from '../infra/errors.js';
import { HistoryManager } from '../infra/history.js';
import { Analyst, type AssistantMessage } from '../runtime/analyst.js';
import { execute } from '../sandbox/executor.js';
import { renderMessage, renderResult, saveCharts } from './render.js';

/** Prompt string shown before user input. */
const PROMPT = '  ' + chalk.bold.green('you') + chalk.dim(' › ');

interface OutputOptions {
    out?: string;
    code?: boolean;
}

function createAnalyst(): Analyst {
    return new Analyst(new MistralProvider(), { transcript: new HistoryManager() });
}

async function writeCharts(charts: readonly Figure[] | undefined, dir: string | undefined, prefix?: string): Promise<void> {
    if (!dir || !charts) return;
    const written = await saveCharts(charts, dir, prefix);
    for (const file of written) printHint(`chart written to ${file}`);
}

async function answer(analyst: Analyst, question: string): Promise<AssistantMessage> {
    const spinner = ora({ text: 'Thinking...', color: 'cyan' }).start();
    try {
        return await analyst.process(question);
    } finally {
        spinner.stop();
    }
}

const program = new Command();

program
    .name('tabletalk')
    .description('TableTalk: ask questions about a CSV file and get tables, charts and answers.')
    .version(config.version);

program
    .command('summary')
    .description('Print the dataset summary the model sees')
    .argument('<csv>', 'CSV file to load')
    .action(async (csv: string) => {
        const { table, encoding } = await loadCsv(csv);
        console.log(summarizeDataset(table, { encoding }).text);
    });

program
    .command('run')
    .description('Run an analysis script against the dataset, without the model')
    .argument('<csv>', 'CSV file to load')
    .argument('<file>', 'JavaScript file to execute in the sandbox')
    .option('-o, --out <dir>', 'Write chart JSON files to this directory')
    .action(async (csv: string, file: string, options: OutputOptions) => {
        const { table } = await loadCsv(csv);
        const code = await readFile(file, 'utf-8');
        const result = execute(code, table);
        console.log(renderResult(result));
        await writeCharts(result.charts, options.out);
        if (result.error) process.exitCode = 1;
    });

program
    .command('ask')
    .description('Ask one question about the dataset')
    .argument('<csv>', 'CSV file to load')
    .argument('<question>', 'Question to ask')
    .option('-o, --out <dir>', 'Write chart JSON files to this directory')
    .option('-c, --code', 'Show the generated code', false)
    .action(async (csv: string, question: string, options: OutputOptions) => {
        const analyst = createAnalyst();
        await analyst.load(csv);
        const message = await answer(analyst, question);
        console.log(renderMessage(message, { showCode: options.code }));
        await writeCharts(message.charts, options.out);
        if (message.error) process.exitCode = 1;
    });

program
    .command('chat')
    .description('Interactive conversation about the dataset')
    .argument('<csv>', 'CSV file to load')
    .option('-o, --out <dir>', 'Write chart JSON files to this directory')
    .option('-c, --code', 'Show the generated code', false)
    .action(async (csv: string, options: OutputOptions) => {
        const analyst = createAnalyst();
        const summary = await analyst.load(csv);

        printBanner(`${basename(csv)} · ${summary.table.rowCount} rows x ${summary.table.columnCount} columns`);
        printStatus('Encoding', summary.encoding);
        printStatus('Model', config.llm.apiKey ? config.llm.model : 'MISTRAL_API_KEY is not set', Boolean(config.llm.apiKey));
        console.log('');
        printHint('Ask a question. /reset starts over, /summary shows the dataset, /exit quits.');
        console.log('');

        const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: PROMPT });
        rl.on('SIGINT', () => rl.close());
        rl.prompt();

        let turn = 0;
        for await (const line of rl) {
            const input = line.trim();
            if (input === '/exit') break;
            if (input === '/reset') {
                analyst.reset();
                printHint('Conversation cleared.');
            } else if (input === '/summary') {
                console.log(summary.text);
            } else if (input) {
                turn++;
                const message = await answer(analyst, input);
                console.log('\n' + renderMessage(message, { showCode: options.code }) + '\n');
                await writeCharts(message.charts, options.out, `turn-${turn}-chart`);
            }
            rl.prompt();
        }
        rl.close();
    });

program
    .command('health')
    .description('Check that the model endpoint is reachable')
    .action(async () => {
        const health = await new MistralProvider().healthCheck();
        if (health.ok) {
            printStatus('Model', `${health.model} · ${health.host}`);
        } else {
            printStatus('Model', `${health.host}: ${health.status ?? 'unreachable'}`, false);
            process.exitCode = 1;
        }
    });

program
    .command('history')
    .description('Show the most recent transcript entries')
    .option('-n, --lines <number>', 'Entries to show', '20')
    .option('--clear', 'Delete the transcript', false)
    .action(async (options: { lines: string; clear: boolean }) => {
        const history = new HistoryManager();
        if (options.clear) {
            await history.clear();
            printHint('Transcript cleared.');
            return;
        }
        const entries = await history.loadLast(parseInt(options.lines, 10) || 20);
        for (const entry of entries) {
            const who = entry.role === 'user' ? chalk.bold.green('you') : chalk.bold.cyan('tabletalk');
            const source = entry.source ? chalk.dim(` [${entry.source}]`) : '';
            console.log(`  ${who}${source} ${chalk.dim('›')} ${entry.content}`);
        }
    });

program.parseAsync().catch((err: unknown) => {
    console.error(`  ${chalk.red('Error:')}`, getErrorMessage(err));
    process.exit(1);
});
