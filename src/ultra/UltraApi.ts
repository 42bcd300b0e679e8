import type { HttpTransport } from '../client/HttpTransport.js';
import {
  RoutersSchema,
  ShieldSchema,
  TokenBalancesSchema,
  UltraExecuteResponseSchema,
  UltraOrderResponseSchema,
  type Router,
  type Shield,
  type TokenBalances,
  type UltraExecuteRequest,
  type UltraExecuteResponse,
  type UltraOrderResponse
} from '../types/Ultra.js';
import { toAddress, toAddressList, type AddressInput } from '../utils/encoding.js';
import { assertNonEmpty, assertNonEmptyList } from '../utils/invariant.js';
import type { UltraOrderRequest } from './UltraOrderRequest.js';

export class UltraApi {
  constructor(readonly transport: HttpTransport) {}

  async getOrder(request: UltraOrderRequest): Promise<UltraOrderResponse> {
    return this.transport.get('/ultra/v1/order', UltraOrderResponseSchema, request.toQueryParams());
  }

  /**
   * Submits a signed order transaction. Not idempotent: the service broadcasts it.
   */
  async executeOrder(request: UltraExecuteRequest): Promise<UltraExecuteResponse> {
    return this.transport.post('/ultra/v1/execute', UltraExecuteResponseSchema, {
      signedTransaction: assertNonEmpty(request.signedTransaction, 'signedTransaction'),
      requestId: assertNonEmpty(request.requestId, 'requestId')
    });
  }

  async getBalances(address: AddressInput): Promise<TokenBalances> {
    const wallet = encodeURIComponent(toAddress(address, 'address'));
    return this.transport.get(`/ultra/v1/balances/${wallet}`, TokenBalancesSchema);
  }

  /** Token-safety warnings for each mint, e.g. `HAS_FREEZE_AUTHORITY`. */
  async shield(mints: readonly AddressInput[]): Promise<Shield> {
    const list = toAddressList(mints, 'mints');
    assertNonEmptyList(list, 'mints');
    return this.transport.get('/ultra/v1/shield', ShieldSchema, { mints: list });
  }

  async getRouters(): Promise<Router[]> {
    return this.transport.get('/ultra/v1/order/routers', RoutersSchema);
  }
}
