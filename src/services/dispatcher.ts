// src/services/dispatcher.ts
import { z } from 'zod';
import { RateLimiter } from './rateLimiter';
import { parseCallbackData, parseCommand } from './callbackActions';
import {
  BotMessage,
  BotMessageSchema,
  CallbackQuery,
  CallbackQuerySchema,
  ChatJoinRequest,
  ChatJoinRequestSchema,
  PreCheckoutQuery,
  PreCheckoutQuerySchema,
  SuccessfulPayment
} from '../schemas/update';
import {
  BroadcastPayload,
  BroadcastPayloadSchema,
  NotifyLivePayload,
  NotifyLivePayloadSchema
} from '../schemas/jobPayloads';
import { isJobType, Job } from '../types/job';
import { dropped, HandlerOutcome, retryable } from '../types/outcome';
import { errorMessage, logError, logInfo, logWarn } from '../utils/logger';

/**
 * Business collaborators, one method per route.
 */
export interface JobHandlers {
  // messages
  start(ctx: string, message: BotMessage, referrerId: number | null): Promise<HandlerOutcome>;
  reservedCommand(ctx: string, message: BotMessage, command: 'init' | 'activate'): Promise<HandlerOutcome>;
  broadcastCommand(ctx: string, message: BotMessage, text: string): Promise<HandlerOutcome>;
  successfulPayment(ctx: string, message: BotMessage, payment: SuccessfulPayment): Promise<HandlerOutcome>;

  // callbacks
  myAccount(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  checkLive(ctx: string, query: CallbackQuery, page: number): Promise<HandlerOutcome>;
  back(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  help(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  referrals(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  settings(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  languageMenu(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  setLanguage(ctx: string, query: CallbackQuery, language: string, initial: boolean): Promise<HandlerOutcome>;
  toggleNotifications(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  clearNotifications(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  buy(ctx: string, query: CallbackQuery): Promise<HandlerOutcome>;
  pay(ctx: string, query: CallbackQuery, packageId: string): Promise<HandlerOutcome>;

  // other updates
  preCheckout(ctx: string, query: PreCheckoutQuery): Promise<HandlerOutcome>;
  joinRequest(ctx: string, request: ChatJoinRequest): Promise<HandlerOutcome>;

  // queued work
  broadcastMessage(ctx: string, payload: BroadcastPayload): Promise<HandlerOutcome>;
  notifyLive(ctx: string, payload: NotifyLivePayload): Promise<HandlerOutcome>;
}

export class PayloadDecodeError extends Error {
  constructor(
    public readonly what: string,
    public readonly issue: string
  ) {
    super(`Invalid ${what}: ${issue}`);
    this.name = 'PayloadDecodeError';
  }
}

const UpdateEnvelopeSchema = z.record(z.unknown());
type UpdateEnvelope = z.infer<typeof UpdateEnvelopeSchema>;

function decode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    throw new PayloadDecodeError(what, `${path}${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

/**
 * Payload column is JSON text; some drivers hand back an already decoded
 * object.
 */
export function decodeJobPayload(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new PayloadDecodeError('payload', `not valid JSON (${errorMessage(err)})`);
  }
}

function present(update: UpdateEnvelope, key: string): boolean {
  return update[key] !== undefined && update[key] !== null;
}

export interface DispatcherDeps {
  handlers: JobHandlers;
  rateLimiter: RateLimiter;
}

export class Dispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  /**
   * Never throws: decode failures and handler errors come back as
   * `retryable`.
   */
  async dispatch(job: Job, ctx: string): Promise<HandlerOutcome> {
    try {
      return await this.route(job, ctx);
    } catch (err) {
      if (err instanceof PayloadDecodeError) {
        logError(ctx, 'Undecodable job payload', {
          jobId: job.job_id,
          jobType: job.job_type,
          error: err.message
        });
      } else {
        logError(ctx, 'Handler raised', {
          jobId: job.job_id,
          jobType: job.job_type,
          error: errorMessage(err)
        });
      }
      return retryable(errorMessage(err));
    }
  }

  private async route(job: Job, ctx: string): Promise<HandlerOutcome> {
    const { handlers } = this.deps;

    if (!isJobType(job.job_type)) {
      logWarn(ctx, 'Unknown job type, dropping', { jobId: job.job_id, jobType: job.job_type });
      return dropped(`unknown job type ${job.job_type}`);
    }

    const payload = decodeJobPayload(job.payload);

    switch (job.job_type) {
      case 'process_update':
        return this.routeUpdate(decode(UpdateEnvelopeSchema, payload, 'update'), ctx);
      case 'broadcast_message':
        return handlers.broadcastMessage(
          ctx,
          decode(BroadcastPayloadSchema, payload, 'broadcast_message payload')
        );
      case 'notify_live':
        return handlers.notifyLive(
          ctx,
          decode(NotifyLivePayloadSchema, payload, 'notify_live payload')
        );
      case 'send_to_groups':
        logWarn(ctx, 'send_to_groups is consumed elsewhere, dropping', { jobId: job.job_id });
        return dropped('send_to_groups is not processed by this worker');
    }
  }

  private async routeUpdate(update: UpdateEnvelope, ctx: string): Promise<HandlerOutcome> {
    const { handlers } = this.deps;

    if (present(update, 'message')) {
      const message = decode(BotMessageSchema, update.message, 'message');
      return this.routeMessage(message, ctx);
    }

    if (present(update, 'callback_query')) {
      const query = decode(CallbackQuerySchema, update.callback_query, 'callback_query');
      return this.routeCallback(query, ctx);
    }

    if (present(update, 'pre_checkout_query')) {
      const query = decode(PreCheckoutQuerySchema, update.pre_checkout_query, 'pre_checkout_query');
      return handlers.preCheckout(ctx, query);
    }

    if (present(update, 'chat_join_request')) {
      const request = decode(ChatJoinRequestSchema, update.chat_join_request, 'chat_join_request');
      return handlers.joinRequest(ctx, request);
    }

    logInfo(ctx, 'No handler for update type', { keys: Object.keys(update) });
    return dropped('no handler for update type');
  }

  private async routeMessage(message: BotMessage, ctx: string): Promise<HandlerOutcome> {
    const { handlers } = this.deps;

    if (message.successful_payment) {
      return handlers.successfulPayment(ctx, message, message.successful_payment);
    }

    const command = parseCommand(message.text);
    if (!command) {
      return dropped('message without a known command');
    }

    switch (command.name) {
      case 'start':
        return handlers.start(ctx, message, command.referrerId);
      case 'init':
      case 'activate':
        return handlers.reservedCommand(ctx, message, command.name);
      case 'broadcast':
        return handlers.broadcastCommand(ctx, message, command.text);
    }
  }

  private async routeCallback(query: CallbackQuery, ctx: string): Promise<HandlerOutcome> {
    const { handlers, rateLimiter } = this.deps;

    if (!rateLimiter.allowed(query.from.id, 'button_click')) {
      logWarn(ctx, 'Button click rate limit exceeded', { userId: query.from.id });
      return dropped('button_click rate limit exceeded');
    }

    const action = parseCallbackData(query.data);

    switch (action.kind) {
      case 'my_account':
        return handlers.myAccount(ctx, query);
      case 'check_live':
        return handlers.checkLive(ctx, query, action.page);
      case 'back':
        return handlers.back(ctx, query);
      case 'help':
        return handlers.help(ctx, query);
      case 'referrals':
        return handlers.referrals(ctx, query);
      case 'settings':
        return handlers.settings(ctx, query);
      case 'language_menu':
        return handlers.languageMenu(ctx, query);
      case 'set_language':
        return handlers.setLanguage(ctx, query, action.language, action.initial);
      case 'toggle_notifications':
        return handlers.toggleNotifications(ctx, query);
      case 'clear_notifications':
        return handlers.clearNotifications(ctx, query);
      case 'buy':
        return handlers.buy(ctx, query);
      case 'pay':
        return handlers.pay(ctx, query, action.packageId);
      case 'unknown':
        logInfo(ctx, 'No handler for callback data', { data: action.data });
        return dropped(`no handler for callback data '${action.data}'`);
    }
  }
}
