import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const logging = vi.hoisted(() => ({ level: 'info', silent: false }));

vi.mock('../config/index.js', () => ({
    config: { logging },
}));

import { logger } from './logger.js';

function spyConsole() {
    return {
        logSpy: vi.spyOn(console, 'log').mockImplementation(() => undefined),
        warnSpy: vi.spyOn(console, 'warn').mockImplementation(() => undefined),
        errorSpy: vi.spyOn(console, 'error').mockImplementation(() => undefined),
    };
}

describe('logger', () => {
    let logSpy: ReturnType<typeof spyConsole>['logSpy'];
    let warnSpy: ReturnType<typeof spyConsole>['warnSpy'];
    let errorSpy: ReturnType<typeof spyConsole>['errorSpy'];

    beforeEach(() => {
        logging.level = 'info';
        logging.silent = false;
        ({ logSpy, warnSpy, errorSpy } = spyConsole());
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prefixes messages, TableTalk by default', () => {
        logger.info('loaded sales.csv');
        logger.info('3 rows', 'Analyst');
        const [first, second] = logSpy.mock.calls.map(call => String(call[0]));
        expect(first).toContain('[TableTalk]');
        expect(first).toContain('loaded sales.csv');
        expect(second).toContain('[Analyst]');
        expect(second).toContain('3 rows');
    });

    it('routes warnings and errors to their console streams', () => {
        logger.success('done', 'Test');
        logger.warn('careful', 'Test');
        logger.error('bad thing', 'Test');
        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(warnSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('prints the stack when an error is attached', () => {
        logger.error('failed', 'Test', new Error('boom'));
        expect(errorSpy).toHaveBeenCalledTimes(2);
        expect(String(errorSpy.mock.calls[1][0])).toContain('Error: boom');
    });

    it('filters by level', () => {
        logger.debug('noisy', 'Sandbox');
        expect(logSpy).not.toHaveBeenCalled();

        logging.level = 'debug';
        logger.debug('noisy', 'Sandbox');
        expect(String(logSpy.mock.calls[0][0])).toContain('[Sandbox]');

        logging.level = 'error';
        logger.info('hidden');
        logger.warn('hidden');
        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(warnSpy).not.toHaveBeenCalled();
    });

    it('stays quiet when silent, except for errors', () => {
        logging.silent = true;
        logger.info('hidden');
        logger.important('hidden');
        logger.error('shown');
        expect(logSpy).not.toHaveBeenCalled();
        expect(errorSpy).toHaveBeenCalledTimes(1);
    });
});
