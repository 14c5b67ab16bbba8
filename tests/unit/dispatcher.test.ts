import { describe, it, expect, vi } from 'vitest';
import { Dispatcher } from '../../src/services/dispatcher';
import { RateLimiter } from '../../src/services/rateLimiter';
import { Job } from '../../src/types/job';
import { ok } from '../../src/types/outcome';

function createHandlers() {
  const handler = () => vi.fn(async () => ok());
  return {
    start: handler(),
    reservedCommand: handler(),
    broadcastCommand: handler(),
    successfulPayment: handler(),
    myAccount: handler(),
    checkLive: handler(),
    back: handler(),
    help: handler(),
    referrals: handler(),
    settings: handler(),
    languageMenu: handler(),
    setLanguage: handler(),
    toggleNotifications: handler(),
    clearNotifications: handler(),
    buy: handler(),
    pay: handler(),
    preCheckout: handler(),
    joinRequest: handler(),
    broadcastMessage: handler(),
    notifyLive: handler()
  };
}

function setup(buttonClicks = 20) {
  const handlers = createHandlers();
  const rateLimiter = new RateLimiter({
    limits: { button_click: { maxRequests: buttonClicks, windowSeconds: 60 } },
    now: () => 0
  });
  return { handlers, dispatcher: new Dispatcher({ handlers, rateLimiter }) };
}

function job(jobType: string, payload: unknown): Job {
  return {
    job_id: 1,
    job_type: jobType,
    payload: typeof payload === 'string' ? payload : JSON.stringify(payload),
    status: 'processing',
    retries: 0,
    created_at: new Date('2024-05-01T00:00:00Z'),
    updated_at: new Date('2024-05-01T00:00:00Z')
  };
}

const user = { id: 42, first_name: 'Ada' };
const message = (text: string) => ({ message_id: 10, from: user, chat: { id: 42 }, text });
const callback = (data: string) => ({ id: 'cb1', from: user, data });

describe('Dispatcher', () => {
  it('drops unknown job types', async () => {
    const { dispatcher } = setup();

    await expect(dispatcher.dispatch(job('mystery', {}), 'job:1')).resolves.toEqual({
      status: 'dropped',
      reason: 'unknown job type mystery'
    });
  });

  it('drops send_to_groups without touching a handler', async () => {
    const { dispatcher } = setup();

    const outcome = await dispatcher.dispatch(job('send_to_groups', {}), 'job:1');
    expect(outcome.status).toBe('dropped');
  });

  it('reports payloads that are not JSON as retryable', async () => {
    const { dispatcher } = setup();

    const outcome = await dispatcher.dispatch(job('notify_live', '{not json'), 'job:1');

    expect(outcome.status).toBe('retryable');
    if (outcome.status !== 'retryable') return;
    expect(outcome.error).toMatch(/^Invalid payload: not valid JSON/);
  });

  it('routes /start with its referrer', async () => {
    const { dispatcher, handlers } = setup();
    const msg = message('/start ref_5');

    await dispatcher.dispatch(job('process_update', { update_id: 1, message: msg }), 'job:1');

    expect(handlers.start).toHaveBeenCalledWith('job:1', msg, 5);
  });

  it('prefers message over callback_query when both are present', async () => {
    const { dispatcher, handlers } = setup();

    await dispatcher.dispatch(
      job('process_update', {
        update_id: 1,
        message: message('/start'),
        callback_query: callback('my_account')
      }),
      'job:1'
    );

    expect(handlers.start).toHaveBeenCalledTimes(1);
    expect(handlers.myAccount).not.toHaveBeenCalled();
  });

  it('routes successful payments before commands', async () => {
    const { dispatcher, handlers } = setup();
    const payment = {
      currency: 'XTR',
      total_amount: 150,
      invoice_payload: 'premium_7d:42',
      telegram_payment_charge_id: 'charge-1'
    };
    const msg = { message_id: 11, from: user, chat: { id: 42 }, successful_payment: payment };

    await dispatcher.dispatch(job('process_update', { update_id: 2, message: msg }), 'job:1');

    expect(handlers.successfulPayment).toHaveBeenCalledWith('job:1', msg, payment);
  });

  it('drops plain text messages', async () => {
    const { dispatcher } = setup();

    await expect(
      dispatcher.dispatch(job('process_update', { update_id: 1, message: message('hello') }), 'job:1')
    ).resolves.toEqual({ status: 'dropped', reason: 'message without a known command' });
  });

  it('passes the live list page to the handler', async () => {
    const { dispatcher, handlers } = setup();
    const query = callback('check_live:2');

    await dispatcher.dispatch(job('process_update', { update_id: 1, callback_query: query }), 'job:1');

    expect(handlers.checkLive).toHaveBeenCalledWith('job:1', query, 2);
  });

  it('drops button clicks over the limit', async () => {
    const { dispatcher, handlers } = setup(1);
    const update = { update_id: 1, callback_query: callback('help') };

    await dispatcher.dispatch(job('process_update', update), 'job:1');
    const second = await dispatcher.dispatch(job('process_update', update), 'job:2');

    expect(second).toEqual({ status: 'dropped', reason: 'button_click rate limit exceeded' });
    expect(handlers.help).toHaveBeenCalledTimes(1);
  });

  it('drops unknown callback data', async () => {
    const { dispatcher } = setup();

    await expect(
      dispatcher.dispatch(job('process_update', { update_id: 1, callback_query: callback('zzz') }), 'job:1')
    ).resolves.toEqual({ status: 'dropped', reason: "no handler for callback data 'zzz'" });
  });

  it('routes pre-checkout queries and join requests', async () => {
    const { dispatcher, handlers } = setup();
    const preCheckout = {
      id: 'pcq-1',
      from: user,
      currency: 'XTR',
      total_amount: 150,
      invoice_payload: 'premium_7d:42'
    };
    const joinRequest = { chat: { id: -100 }, from: user };

    await dispatcher.dispatch(job('process_update', { update_id: 1, pre_checkout_query: preCheckout }), 'job:1');
    await dispatcher.dispatch(job('process_update', { update_id: 2, chat_join_request: joinRequest }), 'job:2');

    expect(handlers.preCheckout).toHaveBeenCalledWith('job:1', preCheckout);
    expect(handlers.joinRequest).toHaveBeenCalledWith('job:2', joinRequest);
  });

  it('drops updates with no known key', async () => {
    const { dispatcher } = setup();

    await expect(
      dispatcher.dispatch(job('process_update', { update_id: 1, edited_message: {} }), 'job:1')
    ).resolves.toEqual({ status: 'dropped', reason: 'no handler for update type' });
  });

  it('reports a malformed update section as retryable', async () => {
    const { dispatcher } = setup();

    await expect(
      dispatcher.dispatch(
        job('process_update', { update_id: 1, message: { message_id: 1, text: '/start' } }),
        'job:1'
      )
    ).resolves.toEqual({ status: 'retryable', error: 'Invalid message: chat: Required' });
  });

  it('accepts notify_live payloads that name the account as username', async () => {
    const { dispatcher, handlers } = setup();

    await dispatcher.dispatch(
      job('notify_live', { username: 'acct1', link: 'https://example.com/acct1' }),
      'job:1'
    );

    expect(handlers.notifyLive).toHaveBeenCalledWith('job:1', {
      entity: 'acct1',
      link: 'https://example.com/acct1',
      lastLiveAt: null
    });
  });

  it('defaults the broadcast target to everyone', async () => {
    const { dispatcher, handlers } = setup();

    await dispatcher.dispatch(job('broadcast_message', { message: 'hi' }), 'job:1');

    expect(handlers.broadcastMessage).toHaveBeenCalledWith('job:1', { message: 'hi', target: 'all' });
  });

  it('turns a handler exception into a retryable outcome', async () => {
    const { dispatcher, handlers } = setup();
    handlers.notifyLive.mockRejectedValueOnce(new Error('boom'));

    await expect(
      dispatcher.dispatch(job('notify_live', { entity: 'acct1', link: 'https://x.test' }), 'job:1')
    ).resolves.toEqual({ status: 'retryable', error: 'boom' });
  });
});
