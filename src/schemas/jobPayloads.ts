import { z } from 'zod';

/**
 * notify_live jobs come from a database trigger that writes `username`,
 * manual or API producers may use `entity`.
 */
export const NotifyLivePayloadSchema = z
  .object({
    entity: z.string().min(1).optional(),
    username: z.string().min(1).optional(),
    link: z.string().min(1),
    last_live_at: z.string().nullable().optional()
  })
  .refine((p) => Boolean(p.entity ?? p.username), {
    message: 'entity or username is required'
  })
  .transform((p) => ({
    entity: p.entity ?? p.username ?? '',
    link: p.link,
    lastLiveAt: p.last_live_at ?? null
  }));

export const BROADCAST_TARGETS = ['all', 'free', 'premium', 'inactive'] as const;

export const BroadcastTargetSchema = z.union([
  z.enum(BROADCAST_TARGETS),
  z.string().regex(/^lang:[a-z]{2}$/)
]);

export const BroadcastPayloadSchema = z.object({
  message: z.string(),
  target: BroadcastTargetSchema.default('all'),
  source: z.enum(['admin', 'auto', 'api']).optional()
});

export type NotifyLivePayload = z.output<typeof NotifyLivePayloadSchema>;
export type BroadcastTarget = z.infer<typeof BroadcastTargetSchema>;
export type BroadcastPayload = z.output<typeof BroadcastPayloadSchema>;
