import type { QueryParams } from '../codec/wire.js';
import type { OrderStatus } from '../types/Orders.js';
import type { RecurringOrderFilter } from '../types/Recurring.js';
import { toAddress, type AddressInput } from '../utils/encoding.js';
import { assertNonEmpty, invariant } from '../utils/invariant.js';

export type GetRecurringOrdersParams = {
  readonly recurringType: RecurringOrderFilter;
  readonly orderStatus: OrderStatus;
  readonly user: string;
  readonly page: number;
  readonly mint?: string;
  readonly includeFailedTx: boolean;
};

/** Query for `GET /recurring/v1/getRecurringOrders`. Starts on page 1 without failed transactions. */
export class GetRecurringOrders {
  private constructor(readonly params: GetRecurringOrdersParams) {}

  static create(recurringType: RecurringOrderFilter, orderStatus: OrderStatus, user: AddressInput): GetRecurringOrders {
    return new GetRecurringOrders({
      recurringType,
      orderStatus,
      user: toAddress(user, 'user'),
      page: 1,
      includeFailedTx: false
    });
  }

  withPage(page: number): GetRecurringOrders {
    invariant(Number.isInteger(page) && page >= 1, 'page must be an integer >= 1', { value: page });
    return this.with({ page });
  }

  withMint(mint: string): GetRecurringOrders {
    return this.with({ mint: assertNonEmpty(mint, 'mint') });
  }

  withIncludeFailedTx(includeFailedTx: boolean): GetRecurringOrders {
    return this.with({ includeFailedTx });
  }

  toQueryParams(): QueryParams {
    const p = this.params;
    return {
      recurringType: p.recurringType,
      orderStatus: p.orderStatus,
      user: p.user,
      page: p.page,
      mint: p.mint,
      includeFailedTx: p.includeFailedTx
    };
  }

  private with(patch: Partial<GetRecurringOrdersParams>): GetRecurringOrders {
    return new GetRecurringOrders({ ...this.params, ...patch });
  }
}
