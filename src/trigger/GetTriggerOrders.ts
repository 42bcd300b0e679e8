import type { QueryParams } from '../codec/wire.js';
import type { OrderStatus } from '../types/Orders.js';
import { toAddress, type AddressInput } from '../utils/encoding.js';
import { assertNonEmpty, invariant } from '../utils/invariant.js';

export type GetTriggerOrdersParams = {
  readonly user: string;
  readonly orderStatus: OrderStatus;
  readonly page?: number;
  readonly inputMint?: string;
  readonly outputMint?: string;
  readonly includeFailedTx?: boolean;
};

/** Query for `GET /trigger/v1/getTriggerOrders`. */
export class GetTriggerOrders {
  private constructor(readonly params: GetTriggerOrdersParams) {}

  static create(user: AddressInput, orderStatus: OrderStatus): GetTriggerOrders {
    return new GetTriggerOrders({ user: toAddress(user, 'user'), orderStatus });
  }

  withPage(page: number): GetTriggerOrders {
    invariant(Number.isInteger(page) && page >= 1, 'page must be an integer >= 1', { value: page });
    return this.with({ page });
  }

  withInputMint(inputMint: string): GetTriggerOrders {
    return this.with({ inputMint: assertNonEmpty(inputMint, 'inputMint') });
  }

  withOutputMint(outputMint: string): GetTriggerOrders {
    return this.with({ outputMint: assertNonEmpty(outputMint, 'outputMint') });
  }

  withIncludeFailedTx(includeFailedTx: boolean): GetTriggerOrders {
    return this.with({ includeFailedTx });
  }

  toQueryParams(): QueryParams {
    const p = this.params;
    return {
      user: p.user,
      orderStatus: p.orderStatus,
      page: p.page,
      inputMint: p.inputMint,
      outputMint: p.outputMint,
      includeFailedTx: p.includeFailedTx
    };
  }

  private with(patch: Partial<GetTriggerOrdersParams>): GetTriggerOrders {
    return new GetTriggerOrders({ ...this.params, ...patch });
  }
}
