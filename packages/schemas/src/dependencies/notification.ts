import { z } from 'zod';
import { userIdSchema } from '../rest/offers.js';

export const notificationTypeSchema = z.enum([
  'trade_offer_accepted',
  'trade_offer_rejected',
  'trade_offer_cancelled',
  'trade_completed',
]);

export type NotificationType = z.infer<typeof notificationTypeSchema>;

export const notificationPayloadSchema = z.object({
  recipientId: userIdSchema,
  type: notificationTypeSchema,
  title: z.string().min(1),
  body: z.string().min(1),
  relatedOfferId: z.number().int().positive(),
  relatedUserId: userIdSchema,
});

export type NotificationPayload = z.infer<typeof notificationPayloadSchema>;
