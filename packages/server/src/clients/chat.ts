import type { ChatRoomRequest } from '@tradepost/schemas';
import { createJsonHttpClient, type HttpClientOptions } from './http.js';

export interface ChatClient {
  createRoom(request: ChatRoomRequest): Promise<void>;
}

export const createChatClient = (options: HttpClientOptions): ChatClient => {
  const http = createJsonHttpClient(options);

  return {
    async createRoom(request) {
      await http.post('/api/v1/chat-rooms', request);
    },
  };
};
