// src/handlers/paymentHandlers.ts
import { JobHandlers } from '../services/dispatcher';
import {
  buildInvoicePayload,
  getPaymentPackage,
  parseInvoicePayload,
  PAYMENT_CURRENCY,
  PAYMENT_PACKAGES
} from '../config/paymentPackages';
import { PreCheckoutQuery } from '../schemas/update';
import { PreCheckoutAnswer } from '../services/botApiClient';
import { dropped, ok } from '../types/outcome';
import { DeadlineExceededError, withDeadline } from '../utils/deadline';
import { errorMessage, logError, logInfo, logWarn } from '../utils/logger';
import { DIVIDER, packagesKeyboard, rateLimitedText } from './menus';
import { deliver, HandlerDeps, isPremium, reply, showScreen } from './context';

type PaymentHandlers = Pick<JobHandlers, 'buy' | 'pay' | 'preCheckout' | 'successfulPayment'>;

export type InvoiceCheck =
  | { valid: true; packageId: string }
  | { valid: false; reason: string };

const REJECTED_TEXT = 'Payment could not be validated. Please try again.';
const TIMED_OUT_TEXT = 'Payment validation timed out. Please try again.';

/**
 * Checks shared by pre-checkout and the final payment message: payload
 * shape, payer, package and amount.
 */
export function checkInvoice(
  invoicePayload: string,
  payerId: number,
  currency: string,
  amount: number
): InvoiceCheck {
  const parsed = parseInvoicePayload(invoicePayload);
  if (!parsed) return { valid: false, reason: 'malformed invoice payload' };

  if (parsed.userId !== payerId) return { valid: false, reason: 'payer does not match invoice' };

  const pkg = getPaymentPackage(parsed.packageId);
  if (!pkg) return { valid: false, reason: `unknown package ${parsed.packageId}` };

  if (currency !== PAYMENT_CURRENCY) return { valid: false, reason: `unexpected currency ${currency}` };
  if (amount !== pkg.stars) {
    return { valid: false, reason: `amount ${amount} does not match price ${pkg.stars}` };
  }

  return { valid: true, packageId: parsed.packageId };
}

export function createPaymentHandlers(deps: HandlerDeps): PaymentHandlers {
  const { messenger, users, payments, rateLimiter, bot } = deps;

  async function validatePreCheckout(query: PreCheckoutQuery): Promise<PreCheckoutAnswer> {
    const check = checkInvoice(
      query.invoice_payload,
      query.from.id,
      query.currency,
      query.total_amount
    );
    if (!check.valid) return { ok: false, errorMessage: REJECTED_TEXT };

    const user = await users.get(query.from.id);
    if (!user) return { ok: false, errorMessage: 'Please use /start before buying.' };

    return { ok: true };
  }

  return {
    async buy(ctx, query) {
      const premium = await isPremium(deps, query.from.id);

      const lines = Object.values(PAYMENT_PACKAGES).map(
        (pkg) => `  • ${pkg.title} - ⭐ ${pkg.stars} Stars`
      );
      const text =
        (premium ? '🔄 *RENEW PREMIUM*\n' : '⭐ *BUY PREMIUM*\n') +
        `${DIVIDER}\n\n` +
        '🌟 *Premium Packages:*\n' +
        `${lines.join('\n')}\n\n` +
        '✨ *Premium Benefits:*\n' +
        '  ✅ Unlimited checks 24/7\n' +
        '  🔔 Live notifications\n' +
        '  ⚡ No daily limits';

      return showScreen(deps, ctx, query, text, packagesKeyboard());
    },

    async pay(ctx, query, packageId) {
      const userId = query.from.id;

      if (!rateLimiter.allowed(userId, 'payment')) {
        await reply(deps, ctx, userId, rateLimitedText(rateLimiter.resetInSeconds(userId, 'payment')));
        return dropped('payment rate limit exceeded');
      }

      const pkg = getPaymentPackage(packageId);
      if (!pkg) {
        logWarn(ctx, 'Invoice requested for unknown package', { userId, packageId });
        return dropped(`unknown package ${packageId}`);
      }

      const outcome = await deliver(ctx, 'sendInvoice', () =>
        messenger.sendInvoice(userId, {
          title: pkg.title,
          description: `Premium subscription for ${pkg.days} days`,
          payload: buildInvoicePayload(packageId, userId),
          currency: PAYMENT_CURRENCY,
          prices: [{ label: pkg.title, amount: pkg.stars }]
        })
      );

      if (outcome.status === 'ok') {
        logInfo(ctx, 'Invoice sent', { userId, packageId });
      } else {
        try {
          await messenger.sendMessage(
            userId,
            "⚠️ *Payment Error*\n\nCouldn't process payment request. Try again later.",
            { parseMode: 'Markdown' }
          );
        } catch (err) {
          logWarn(ctx, 'Could not report invoice failure to user', {
            userId,
            error: errorMessage(err)
          });
        }
      }
      return outcome;
    },

    /**
     * The platform waits a fixed time for this answer. Validation gets a
     * share of it; when that runs out the answer is a refusal.
     */
    async preCheckout(ctx, query) {
      const started = Date.now();
      let answer: PreCheckoutAnswer;

      try {
        answer = await withDeadline(() => validatePreCheckout(query), bot.preCheckoutValidationBudgetMs);
      } catch (err) {
        const timedOut = err instanceof DeadlineExceededError;
        logError(ctx, timedOut ? 'Pre-checkout validation timed out' : 'Pre-checkout validation failed', {
          queryId: query.id,
          userId: query.from.id,
          error: errorMessage(err)
        });
        answer = { ok: false, errorMessage: timedOut ? TIMED_OUT_TEXT : REJECTED_TEXT };
      }

      const remainingMs = Math.max(1, bot.preCheckoutDeadlineMs - (Date.now() - started));

      try {
        await messenger.answerPreCheckoutQuery(query.id, answer, { timeoutMs: remainingMs });
      } catch (err) {
        // the deadline has passed by the time a retry would run
        logError(ctx, 'Pre-checkout answer failed', {
          queryId: query.id,
          error: errorMessage(err)
        });
        return dropped('pre-checkout answer failed');
      }

      logInfo(ctx, 'Pre-checkout answered', {
        queryId: query.id,
        userId: query.from.id,
        ok: answer.ok
      });
      return ok();
    },

    async successfulPayment(ctx, message, payment) {
      const from = message.from;
      if (!from) return dropped('payment message without sender');

      const check = checkInvoice(
        payment.invoice_payload,
        from.id,
        payment.currency,
        payment.total_amount
      );
      if (!check.valid) {
        logError(ctx, 'Rejected payment', {
          userId: from.id,
          chargeId: payment.telegram_payment_charge_id,
          reason: check.reason
        });
        return dropped('invalid payment');
      }

      const recorded = await payments.recordPayment({
        userId: from.id,
        chargeId: payment.telegram_payment_charge_id,
        amount: payment.total_amount,
        packageId: check.packageId
      });

      if (!recorded) {
        logInfo(ctx, 'Payment already recorded', {
          userId: from.id,
          chargeId: payment.telegram_payment_charge_id
        });
        return ok();
      }

      const pkg = getPaymentPackage(check.packageId);
      logInfo(ctx, 'Payment recorded', {
        userId: from.id,
        packageId: check.packageId,
        amount: payment.total_amount
      });

      const text =
        '✅ *Payment Successful!*\n\n' +
        '🌟 Premium activated!\n' +
        `📅 Valid for ${pkg?.days ?? bot.premiumValidityDays} days\n` +
        '♾️ Unlimited checks enabled!';

      try {
        await messenger.sendMessage(from.id, text, { parseMode: 'Markdown' });
      } catch (err) {
        // recorded already; a retry would not confirm again
        logWarn(ctx, 'Payment confirmation not delivered', {
          userId: from.id,
          error: errorMessage(err)
        });
      }
      return ok();
    }
  };
}
