import type { NotificationPayload } from '@tradepost/schemas';
import { createJsonHttpClient, type HttpClientOptions } from './http.js';

export interface NotificationClient {
  send(payload: NotificationPayload): Promise<void>;
}

export const createNotificationClient = (options: HttpClientOptions): NotificationClient => {
  const http = createJsonHttpClient(options);

  return {
    async send(payload) {
      await http.post('/api/v1/notifications', payload);
    },
  };
};
