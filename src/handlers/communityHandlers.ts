// src/handlers/communityHandlers.ts
import { JobHandlers } from '../services/dispatcher';
import { BroadcastPayload } from '../schemas/jobPayloads';
import { dropped, ok } from '../types/outcome';
import { sleep } from '../utils/dateUtils';
import { errorMessage, logInfo, logWarn } from '../utils/logger';
import { currentPremiumCutoff, deliver, HandlerDeps, reply } from './context';

type CommunityHandlers = Pick<
  JobHandlers,
  'broadcastCommand' | 'broadcastMessage' | 'joinRequest'
>;

export function createCommunityHandlers(deps: HandlerDeps): CommunityHandlers {
  const { messenger, users, jobs, bot } = deps;

  return {
    async broadcastCommand(ctx, message, text) {
      const from = message.from;
      if (!from) return dropped('message without sender');

      if (!bot.adminIds.includes(from.id)) {
        logWarn(ctx, 'Broadcast command from non-admin', { userId: from.id });
        return dropped('broadcast command from non-admin');
      }

      if (!text) {
        return reply(deps, ctx, from.id, 'Usage: /broadcast <message>');
      }

      const payload: BroadcastPayload = { message: text, target: 'all', source: 'admin' };
      const jobId = await jobs.enqueue('broadcast_message', payload);

      logInfo(ctx, 'Broadcast queued by admin', { userId: from.id, jobId });
      return reply(deps, ctx, from.id, `📣 Broadcast queued (job #${jobId}).`);
    },

    /**
     * One message per recipient, spaced out. Individual failures are
     * counted and do not fail the job.
     */
    async broadcastMessage(ctx, payload) {
      if (!payload.message.trim()) {
        logWarn(ctx, 'Empty broadcast message, skipping');
        return dropped('empty broadcast message');
      }

      const recipients = await users.listBroadcastRecipients(
        payload.target,
        currentPremiumCutoff(deps)
      );

      let sent = 0;
      let failed = 0;

      for (const [index, userId] of recipients.entries()) {
        if (index > 0 && deps.broadcastIntervalMs > 0) {
          await sleep(deps.broadcastIntervalMs);
        }

        try {
          await messenger.sendMessage(userId, payload.message, { parseMode: 'Markdown' });
          sent += 1;
        } catch (err) {
          failed += 1;
          logWarn(ctx, 'Broadcast delivery failed', { userId, error: errorMessage(err) });
        }
      }

      logInfo(ctx, 'Broadcast completed', {
        target: payload.target,
        source: payload.source ?? null,
        recipients: recipients.length,
        sent,
        failed
      });
      return ok();
    },

    async joinRequest(ctx, request) {
      const outcome = await deliver(ctx, 'approveChatJoinRequest', () =>
        messenger.approveChatJoinRequest(request.chat.id, request.from.id)
      );
      if (outcome.status === 'ok') {
        logInfo(ctx, 'Join request approved', {
          chatId: request.chat.id,
          userId: request.from.id
        });
      }
      return outcome;
    }
  };
}
