import type { HttpTransport } from '../client/HttpTransport.js';
import { TokenPriceResponseSchema, type TokenPriceResponse } from '../types/Price.js';
import type { TokenPriceRequest } from './TokenPriceRequest.js';

export class PriceApi {
  constructor(readonly transport: HttpTransport) {}

  async getPrices(request: TokenPriceRequest): Promise<TokenPriceResponse> {
    return this.transport.get('/price/v2', TokenPriceResponseSchema, request.toQueryParams());
  }
}
