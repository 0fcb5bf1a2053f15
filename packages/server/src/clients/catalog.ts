// @module: server-client-catalog
// @tags: catalog, http, dependencies

import {
  validateItemsRequestSchema,
  validateItemsResponseSchema,
  type ItemValidation,
  type ValidateItemsRequest,
  type ValidateItemsResponse,
} from '@tradepost/schemas';
import { createJsonHttpClient, type HttpClientOptions } from './http.js';

export interface CatalogClient {
  validateItems(itemIds: readonly number[]): Promise<ItemValidation[]>;
}

export const createCatalogClient = (options: HttpClientOptions): CatalogClient => {
  const http = createJsonHttpClient(options);

  return {
    async validateItems(itemIds) {
      const body: ValidateItemsRequest = validateItemsRequestSchema.parse({ itemIds: [...itemIds] });
      const response = await http.post<unknown>('/api/v1/items/validate', body);

      const parsed: ValidateItemsResponse = validateItemsResponseSchema.parse(response.data);
      return parsed.validations;
    },
  };
};
