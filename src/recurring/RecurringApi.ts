import type { HttpTransport } from '../client/HttpTransport.js';
import {
  ExecuteOrderResponseSchema,
  toExecuteBody,
  type ExecuteOrderRequest,
  type ExecuteOrderResponse
} from '../types/Orders.js';
import {
  RecurringOrdersResponseSchema,
  RecurringTransactionResponseSchema,
  type RecurringOrderType,
  type RecurringOrdersResponse,
  type RecurringTransactionResponse
} from '../types/Recurring.js';
import { toAddress, type AddressInput } from '../utils/encoding.js';
import { assertNonEmpty } from '../utils/invariant.js';
import { toJsonInteger, type AmountInput } from '../utils/math.js';
import type { CreateRecurringOrder } from './CreateRecurringOrder.js';
import type { GetRecurringOrders } from './GetRecurringOrders.js';

export type CancelRecurringOrderRequest = {
  order: string;
  recurringType: RecurringOrderType;
  user: AddressInput;
};

/** Adds funds to a price-based order. */
export type PriceDepositRequest = {
  order: string;
  user: AddressInput;
  amount: AmountInput;
};

export type PriceWithdrawRequest = {
  order: string;
  user: AddressInput;
  inputOrOutput: 'In' | 'Out';
  /** Omit to withdraw everything on that side. */
  amount?: AmountInput;
};

export class RecurringApi {
  constructor(readonly transport: HttpTransport) {}

  async createOrder(request: CreateRecurringOrder): Promise<RecurringTransactionResponse> {
    return this.transport.post('/recurring/v1/createOrder', RecurringTransactionResponseSchema, request.toBody());
  }

  async executeOrder(request: ExecuteOrderRequest): Promise<ExecuteOrderResponse> {
    return this.transport.post('/recurring/v1/execute', ExecuteOrderResponseSchema, toExecuteBody(request));
  }

  async cancelOrder(request: CancelRecurringOrderRequest): Promise<RecurringTransactionResponse> {
    return this.transport.post('/recurring/v1/cancelOrder', RecurringTransactionResponseSchema, {
      order: assertNonEmpty(request.order, 'order'),
      recurringType: request.recurringType,
      user: toAddress(request.user, 'user')
    });
  }

  async priceDeposit(request: PriceDepositRequest): Promise<RecurringTransactionResponse> {
    return this.transport.post('/recurring/v1/priceDeposit', RecurringTransactionResponseSchema, {
      amount: toJsonInteger(request.amount, 'amount'),
      order: assertNonEmpty(request.order, 'order'),
      user: toAddress(request.user, 'user')
    });
  }

  async priceWithdraw(request: PriceWithdrawRequest): Promise<RecurringTransactionResponse> {
    return this.transport.post('/recurring/v1/priceWithdraw', RecurringTransactionResponseSchema, {
      amount: request.amount !== undefined ? toJsonInteger(request.amount, 'amount') : undefined,
      order: assertNonEmpty(request.order, 'order'),
      user: toAddress(request.user, 'user'),
      inputOrOutput: request.inputOrOutput
    });
  }

  async getOrders(request: GetRecurringOrders): Promise<RecurringOrdersResponse> {
    return this.transport.get('/recurring/v1/getRecurringOrders', RecurringOrdersResponseSchema, request.toQueryParams());
  }
}
