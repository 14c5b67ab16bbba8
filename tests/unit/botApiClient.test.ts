import { describe, it, expect, vi, afterEach } from 'vitest';
import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { BotApiClient, BotApiError } from '../../src/services/botApiClient';

interface Captured {
  url: string;
  baseURL: string;
  timeout: number | undefined;
  body: Record<string, unknown>;
}

function adapterReturning(status: number, data: unknown, captured: Captured[]): AxiosAdapter {
  return async (config: InternalAxiosRequestConfig) => {
    captured.push({
      url: config.url ?? '',
      baseURL: config.baseURL ?? '',
      timeout: config.timeout,
      body: JSON.parse(String(config.data))
    });

    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    }
    return response;
  };
}

describe('BotApiClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('posts the method with the token in the base URL and returns the result', async () => {
    const captured: Captured[] = [];
    const client = new BotApiClient({
      token: 'test-token',
      baseUrl: 'https://bot.example.test/',
      adapter: adapterReturning(200, { ok: true, result: { message_id: 77 } }, captured)
    });

    const sent = await client.sendMessage(555, 'hello', {
      parseMode: 'Markdown',
      keyboard: [[{ text: 'Go', callback_data: 'back' }]]
    });

    expect(sent).toEqual({ message_id: 77 });
    expect(captured).toHaveLength(1);
    expect(captured[0].baseURL).toBe('https://bot.example.test/bottest-token');
    expect(captured[0].url).toBe('/sendMessage');
    expect(captured[0].body).toEqual({
      chat_id: 555,
      text: 'hello',
      parse_mode: 'Markdown',
      reply_markup: { inline_keyboard: [[{ text: 'Go', callback_data: 'back' }]] }
    });
  });

  it('sends invoices without a provider token', async () => {
    const captured: Captured[] = [];
    const client = new BotApiClient({
      token: 'test-token',
      adapter: adapterReturning(200, { ok: true, result: { message_id: 1 } }, captured)
    });

    await client.sendInvoice(9, {
      title: 'T',
      description: 'D',
      payload: 'premium_7d:9',
      currency: 'XTR',
      prices: [{ label: 'T', amount: 150 }]
    });

    expect(captured[0].body.provider_token).toBe('');
    expect(captured[0].body.payload).toBe('premium_7d:9');
  });

  it('applies a per-call timeout to pre-checkout answers', async () => {
    const captured: Captured[] = [];
    const client = new BotApiClient({
      token: 'test-token',
      adapter: adapterReturning(200, { ok: true, result: true }, captured)
    });

    await client.answerPreCheckoutQuery('q1', { ok: false, errorMessage: 'nope' }, { timeoutMs: 1234 });

    expect(captured[0].timeout).toBe(1234);
    expect(captured[0].body).toEqual({
      pre_checkout_query_id: 'q1',
      ok: false,
      error_message: 'nope'
    });
  });

  it('turns HTTP errors into BotApiError with the status and description', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const client = new BotApiClient({
      token: 'test-token',
      adapter: adapterReturning(
        403,
        { ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' },
        []
      )
    });

    const err = await client.sendMessage(1, 'x').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BotApiError);
    if (!(err instanceof BotApiError)) return;
    expect(err.method).toBe('sendMessage');
    expect(err.status).toBe(403);
    expect(err.message).toBe('Forbidden: bot was blocked by the user');
  });

  it('treats an ok:false body as an error', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const client = new BotApiClient({
      token: 'test-token',
      adapter: adapterReturning(200, { ok: false, error_code: 400, description: 'Bad Request' }, [])
    });

    const err = await client.deleteMessage(1, 2).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BotApiError);
    if (!(err instanceof BotApiError)) return;
    expect(err.status).toBe(400);
    expect(err.description).toBe('Bad Request');
  });
});
