// src/services/liveNotifier.ts
import { ChatId, Messenger, SendOptions } from './botApiClient';
import { LiveNotificationStore } from '../db/repositories/liveNotificationsRepository';
import { Clock, HOUR_MS, sleep, systemClock } from '../utils/dateUtils';
import { errorMessage, logError, logInfo, logWarn } from '../utils/logger';

/** The platform refuses to delete messages older than this. */
export const MESSAGE_DELETION_WINDOW_MS = 48 * HOUR_MS;

export interface LiveNotifierOptions {
  clock?: Clock;
  /** Pause between two targets. */
  sendIntervalMs?: number;
}

export interface NotifyResult {
  sent: number;
  failed: number;
  /** Earlier alerts removed from the target's chat. */
  retracted: number;
}

/**
 * Keeps at most one live alert per (entity, target): the previous alert
 * and its record are removed before the new one is sent.
 */
export class LiveNotifier {
  private readonly clock: Clock;
  private readonly sendIntervalMs: number;

  constructor(
    private readonly messenger: Messenger,
    private readonly store: LiveNotificationStore,
    options: LiveNotifierOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.sendIntervalMs = options.sendIntervalMs ?? 50;
  }

  async notify(
    ctx: string,
    entityKey: string,
    targets: readonly ChatId[],
    text: string,
    opts: SendOptions = {}
  ): Promise<NotifyResult> {
    const result: NotifyResult = { sent: 0, failed: 0, retracted: 0 };

    for (const [index, target] of targets.entries()) {
      if (index > 0 && this.sendIntervalMs > 0) {
        await sleep(this.sendIntervalMs);
      }

      try {
        if (await this.retractPrevious(ctx, entityKey, target)) {
          result.retracted += 1;
        }

        const message = await this.messenger.sendMessage(target, text, opts);
        await this.store.save({
          entityKey,
          targetId: String(target),
          messageId: message.message_id,
          createdAt: this.clock()
        });
        result.sent += 1;
      } catch (err) {
        result.failed += 1;
        logError(ctx, 'Live alert failed for target', {
          entityKey,
          target,
          error: errorMessage(err)
        });
      }
    }

    logInfo(ctx, 'Live alerts sent', { entityKey, targets: targets.length, ...result });
    return result;
  }

  /**
   * Deletes the earlier alert (best effort) and its record. Returns true
   * when the remote message was deleted.
   */
  private async retractPrevious(
    ctx: string,
    entityKey: string,
    target: ChatId
  ): Promise<boolean> {
    const targetId = String(target);
    const previous = await this.store.find(entityKey, targetId);
    if (!previous) return false;

    let deleted = false;
    const age = this.clock().getTime() - previous.createdAt.getTime();

    if (age < MESSAGE_DELETION_WINDOW_MS) {
      try {
        await this.messenger.deleteMessage(target, previous.messageId);
        deleted = true;
      } catch (err) {
        logWarn(ctx, 'Could not delete previous live alert', {
          entityKey,
          target,
          messageId: previous.messageId,
          error: errorMessage(err)
        });
      }
    }

    await this.store.remove(entityKey, targetId);
    return deleted;
  }
}
