import { z } from 'zod';
import { userIdSchema } from '../rest/offers.js';

export const chatRoomRequestSchema = z.object({
  offerId: z.number().int().positive(),
  userAId: userIdSchema,
  userBId: userIdSchema,
});

export type ChatRoomRequest = z.infer<typeof chatRoomRequestSchema>;
