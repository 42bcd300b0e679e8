import type { HttpTransport } from '../client/HttpTransport.js';
import {
  ExecuteOrderResponseSchema,
  toExecuteBody,
  type ExecuteOrderRequest,
  type ExecuteOrderResponse
} from '../types/Orders.js';
import {
  CancelTriggerOrderResponseSchema,
  CancelTriggerOrdersResponseSchema,
  CreateTriggerOrderResponseSchema,
  TriggerOrdersResponseSchema,
  type CancelTriggerOrderResponse,
  type CancelTriggerOrdersResponse,
  type ComputeUnitPrice,
  type CreateTriggerOrderResponse,
  type TriggerOrdersResponse
} from '../types/Trigger.js';
import { toAddress, type AddressInput } from '../utils/encoding.js';
import { assertNonEmpty } from '../utils/invariant.js';
import { encodeComputeUnitPrice, type CreateTriggerOrder } from './CreateTriggerOrder.js';
import type { GetTriggerOrders } from './GetTriggerOrders.js';

export type CancelTriggerOrderRequest = {
  maker: AddressInput;
  /** Order account address. */
  order: string;
  computeUnitPrice?: ComputeUnitPrice;
};

export type CancelTriggerOrdersRequest = {
  maker: AddressInput;
  /** Omit to cancel every open order of the maker. */
  orders?: readonly string[];
  computeUnitPrice?: ComputeUnitPrice;
};

/**
 * Limit orders. Create and cancel return unsigned transactions; sign them and hand
 * them back through {@link executeOrder}.
 */
export class TriggerApi {
  constructor(readonly transport: HttpTransport) {}

  async createOrder(request: CreateTriggerOrder): Promise<CreateTriggerOrderResponse> {
    return this.transport.post('/trigger/v1/createOrder', CreateTriggerOrderResponseSchema, request.toBody());
  }

  async executeOrder(request: ExecuteOrderRequest): Promise<ExecuteOrderResponse> {
    return this.transport.post('/trigger/v1/execute', ExecuteOrderResponseSchema, toExecuteBody(request));
  }

  async cancelOrder(request: CancelTriggerOrderRequest): Promise<CancelTriggerOrderResponse> {
    return this.transport.post('/trigger/v1/cancelOrder', CancelTriggerOrderResponseSchema, {
      maker: toAddress(request.maker, 'maker'),
      order: assertNonEmpty(request.order, 'order'),
      computeUnitPrice: encodeComputeUnitPrice(request.computeUnitPrice)
    });
  }

  async cancelOrders(request: CancelTriggerOrdersRequest): Promise<CancelTriggerOrdersResponse> {
    return this.transport.post('/trigger/v1/cancelOrders', CancelTriggerOrdersResponseSchema, {
      maker: toAddress(request.maker, 'maker'),
      orders: request.orders?.map((order, i) => assertNonEmpty(order, `orders[${i}]`)),
      computeUnitPrice: encodeComputeUnitPrice(request.computeUnitPrice)
    });
  }

  async getOrders(request: GetTriggerOrders): Promise<TriggerOrdersResponse> {
    return this.transport.get('/trigger/v1/getTriggerOrders', TriggerOrdersResponseSchema, request.toQueryParams());
  }
}
