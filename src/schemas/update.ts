import { z } from 'zod';

export const UserRefSchema = z.object({
  id: z.number().int(),
  first_name: z.string().optional(),
  username: z.string().optional(),
  language_code: z.string().optional()
});

export const ChatRefSchema = z.object({
  id: z.number().int()
});

export const SuccessfulPaymentSchema = z.object({
  currency: z.string(),
  total_amount: z.number().int(),
  invoice_payload: z.string(),
  telegram_payment_charge_id: z.string().min(1)
});

export const BotMessageSchema = z.object({
  message_id: z.number().int(),
  from: UserRefSchema.optional(),
  chat: ChatRefSchema,
  text: z.string().optional(),
  successful_payment: SuccessfulPaymentSchema.optional()
});

export const CallbackQuerySchema = z.object({
  id: z.string(),
  from: UserRefSchema,
  data: z.string().optional(),
  message: z
    .object({
      message_id: z.number().int(),
      chat: ChatRefSchema
    })
    .optional()
});

export const PreCheckoutQuerySchema = z.object({
  id: z.string().min(1),
  from: UserRefSchema,
  currency: z.string(),
  total_amount: z.number().int(),
  invoice_payload: z.string()
});

export const ChatJoinRequestSchema = z.object({
  chat: ChatRefSchema,
  from: UserRefSchema
});

export type UserRef = z.infer<typeof UserRefSchema>;
export type SuccessfulPayment = z.infer<typeof SuccessfulPaymentSchema>;
export type BotMessage = z.infer<typeof BotMessageSchema>;
export type CallbackQuery = z.infer<typeof CallbackQuerySchema>;
export type PreCheckoutQuery = z.infer<typeof PreCheckoutQuerySchema>;
export type ChatJoinRequest = z.infer<typeof ChatJoinRequestSchema>;
