import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MistralProvider } from './providers.js';
import { CredentialsError, ModelResponseError, ModelTransportError } from '../infra/errors.js';

vi.mock('../infra/logger.js', () => ({
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const fetchMock = vi.fn<typeof fetch>();
vi.stubGlobal('fetch', fetchMock);

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createProvider(): MistralProvider {
    return new MistralProvider({ baseUrl: 'https://llm.test/v1/', apiKey: 'test-secret', model: 'test-model', temperature: 0.2 });
}

describe('MistralProvider', () => {
    beforeEach(() => {
        fetchMock.mockReset();
    });

    it('should send a JSON-mode request and return the reply text', async () => {
        fetchMock.mockResolvedValue(jsonResponse({
            choices: [{ message: { role: 'assistant', content: '{"analysis":"ok"}' }, finish_reason: 'stop' }],
        }));

        const reply = await createProvider().chat([{ role: 'user', content: 'hi' }]);

        expect(reply).toBe('{"analysis":"ok"}');
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('https://llm.test/v1/chat/completions');
        expect(init?.method).toBe('POST');
        expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'test-model',
            messages: [{ role: 'user', content: 'hi' }],
            temperature: 0.2,
            stream: false,
            response_format: { type: 'json_object' },
        });
    });

    it('should refuse to call without an API key', async () => {
        const provider = new MistralProvider({ baseUrl: 'https://llm.test/v1', apiKey: '' });
        await expect(provider.chat([])).rejects.toBeInstanceOf(CredentialsError);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should handle API errors', async () => {
        fetchMock.mockResolvedValue(new Response('Internal Error', { status: 500 }));
        const error = await createProvider().chat([]).catch((err: unknown) => err);
        expect(error).toBeInstanceOf(ModelTransportError);
        expect(error).toMatchObject({ status: 500, message: 'Mistral API error: 500 - Internal Error' });
    });

    it('should wrap network failures', async () => {
        fetchMock.mockRejectedValue(new TypeError('fetch failed'));
        await expect(createProvider().chat([])).rejects.toThrow('Could not reach https://llm.test/v1: fetch failed');
    });

    it('should reject payloads without choices', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [] }));
        await expect(createProvider().chat([])).rejects.toBeInstanceOf(ModelResponseError);
    });

    it('should report health from the models endpoint', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ data: [] }));
        await expect(createProvider().healthCheck()).resolves.toEqual({ ok: true, host: 'https://llm.test/v1', model: 'test-model' });

        fetchMock.mockResolvedValueOnce(new Response('nope', { status: 401 }));
        await expect(createProvider().healthCheck()).resolves.toMatchObject({ ok: false, status: 'HTTP 401' });
    });
});
