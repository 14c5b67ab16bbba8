import http from 'http';
import https from 'https';
import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import { logBotApiError } from '../utils/logger';

export type ChatId = number | string;

export interface InlineButton {
  text: string;
  callback_data?: string;
  url?: string;
}

export type InlineKeyboard = InlineButton[][];

export interface SendOptions {
  parseMode?: 'Markdown' | 'HTML';
  keyboard?: InlineKeyboard;
  disablePreview?: boolean;
}

export interface SentMessage {
  message_id: number;
}

export interface InvoiceRequest {
  title: string;
  description: string;
  payload: string;
  currency: string;
  prices: Array<{ label: string; amount: number }>;
}

export type PreCheckoutAnswer =
  | { ok: true }
  | { ok: false; errorMessage: string };

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Everything the handlers need from the chat platform.
 */
export interface Messenger {
  sendMessage(chatId: ChatId, text: string, opts?: SendOptions): Promise<SentMessage>;
  editMessageText(
    chatId: ChatId,
    messageId: number,
    text: string,
    opts?: SendOptions
  ): Promise<void>;
  deleteMessage(chatId: ChatId, messageId: number): Promise<void>;
  sendInvoice(chatId: ChatId, invoice: InvoiceRequest): Promise<void>;
  answerPreCheckoutQuery(
    queryId: string,
    answer: PreCheckoutAnswer,
    opts?: CallOptions
  ): Promise<void>;
  approveChatJoinRequest(chatId: ChatId, userId: number): Promise<void>;
}

export class BotApiError extends Error {
  constructor(
    public readonly method: string,
    public readonly status: number | undefined,
    public readonly description: string | undefined,
    message: string
  ) {
    super(message);
    this.name = 'BotApiError';
  }
}

interface BotApiResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
}

export interface BotApiClientOptions {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
}

function descriptionOf(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'description' in data) {
    const { description } = data;
    return typeof description === 'string' ? description : undefined;
  }
  return undefined;
}

export class BotApiClient implements Messenger {
  private client: AxiosInstance;

  constructor(opts: BotApiClientOptions) {
    const baseUrl = (opts.baseUrl || 'https://api.telegram.org').replace(/\/+$/, '');

    this.client = axios.create({
      baseURL: `${baseUrl}/bot${opts.token}`,
      headers: { 'Content-Type': 'application/json' },
      timeout: opts.timeoutMs ?? 15000,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
      adapter: opts.adapter
    });
  }

  private async call<T>(
    method: string,
    params: Record<string, unknown>,
    opts: CallOptions = {}
  ): Promise<T> {
    const ctx = `bot-api:${method}`;
    const config: AxiosRequestConfig = {
      method: 'POST',
      url: `/${method}`,
      data: params
    };
    if (opts.timeoutMs !== undefined) config.timeout = opts.timeoutMs;
    if (opts.signal) config.signal = opts.signal;

    let body: BotApiResponse<T>;
    let status: number;
    try {
      const res = await this.client.request<BotApiResponse<T>>(config);
      body = res.data;
      status = res.status;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const description = descriptionOf(err.response?.data);
        logBotApiError(ctx, method, {
          status: err.response?.status,
          description,
          message: err.message
        });
        throw new BotApiError(
          method,
          err.response?.status,
          description,
          description ?? err.message
        );
      }
      throw err;
    }

    if (!body.ok || body.result === undefined) {
      const description = body.description ?? 'Empty response';
      logBotApiError(ctx, method, { status, description, message: description });
      throw new BotApiError(method, body.error_code ?? status, description, description);
    }

    return body.result;
  }

  async sendMessage(
    chatId: ChatId,
    text: string,
    opts: SendOptions = {}
  ): Promise<SentMessage> {
    return this.call<SentMessage>('sendMessage', {
      chat_id: chatId,
      text,
      parse_mode: opts.parseMode,
      reply_markup: opts.keyboard ? { inline_keyboard: opts.keyboard } : undefined,
      disable_web_page_preview: opts.disablePreview
    });
  }

  async editMessageText(
    chatId: ChatId,
    messageId: number,
    text: string,
    opts: SendOptions = {}
  ): Promise<void> {
    await this.call<unknown>('editMessageText', {
      chat_id: chatId,
      message_id: messageId,
      text,
      parse_mode: opts.parseMode,
      reply_markup: opts.keyboard ? { inline_keyboard: opts.keyboard } : undefined,
      disable_web_page_preview: opts.disablePreview
    });
  }

  async deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
    await this.call<boolean>('deleteMessage', {
      chat_id: chatId,
      message_id: messageId
    });
  }

  async sendInvoice(chatId: ChatId, invoice: InvoiceRequest): Promise<void> {
    await this.call<SentMessage>('sendInvoice', {
      chat_id: chatId,
      title: invoice.title,
      description: invoice.description,
      payload: invoice.payload,
      // digital goods paid in the platform currency take no provider token
      provider_token: '',
      currency: invoice.currency,
      prices: invoice.prices
    });
  }

  async answerPreCheckoutQuery(
    queryId: string,
    answer: PreCheckoutAnswer,
    opts: CallOptions = {}
  ): Promise<void> {
    await this.call<boolean>(
      'answerPreCheckoutQuery',
      {
        pre_checkout_query_id: queryId,
        ok: answer.ok,
        error_message: answer.ok ? undefined : answer.errorMessage
      },
      opts
    );
  }

  async approveChatJoinRequest(chatId: ChatId, userId: number): Promise<void> {
    await this.call<boolean>('approveChatJoinRequest', {
      chat_id: chatId,
      user_id: userId
    });
  }
}
