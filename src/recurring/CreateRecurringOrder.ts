import { formatIssues } from '../codec/decode.js';
import { JupiterError } from '../errors/JupiterError.js';
import {
  CreateRecurringOrderBodySchema,
  type CreateRecurringOrderBody,
  type RecurringOrderParams,
  type RecurringOrderType,
  type TimeParams
} from '../types/Recurring.js';
import { toAddress, type AddressInput } from '../utils/encoding.js';
import { assertNonEmpty, invariant } from '../utils/invariant.js';
import { toJsonInteger, type AmountInput } from '../utils/math.js';

type OrderBase = {
  user: AddressInput;
  inputMint: string;
  outputMint: string;
};

function checkPrice(value: number, fieldName: string): number {
  invariant(Number.isFinite(value) && value >= 0, `${fieldName} must be a finite, non-negative number`, { value });
  return value;
}

function positive(value: AmountInput, fieldName: string): number {
  const parsed = toJsonInteger(value, fieldName);
  invariant(parsed > 0, `${fieldName} must be > 0`);
  return parsed;
}

/**
 * Body for `POST /recurring/v1/createOrder`. A time-based order spends `inAmount`
 * over `numberOfOrders` buys; a price-based one buys `incrementUsdcValue` worth of
 * output each interval out of a deposit.
 */
export class CreateRecurringOrder {
  private constructor(private readonly body: CreateRecurringOrderBody) {}

  get recurringType(): RecurringOrderType {
    return 'time' in this.body.params ? 'time' : 'price';
  }

  static timeBased(
    args: OrderBase & { inAmount: AmountInput; numberOfOrders: number; intervalSeconds: number }
  ): CreateRecurringOrder {
    return new CreateRecurringOrder({
      ...CreateRecurringOrder.base(args),
      params: {
        time: {
          inAmount: positive(args.inAmount, 'inAmount'),
          numberOfOrders: positive(args.numberOfOrders, 'numberOfOrders'),
          interval: positive(args.intervalSeconds, 'interval')
        }
      }
    });
  }

  static priceBased(
    args: OrderBase & { depositAmount: AmountInput; incrementUsdcValue: AmountInput; intervalSeconds: number }
  ): CreateRecurringOrder {
    return new CreateRecurringOrder({
      ...CreateRecurringOrder.base(args),
      params: {
        price: {
          depositAmount: positive(args.depositAmount, 'depositAmount'),
          incrementUsdcValue: positive(args.incrementUsdcValue, 'incrementUsdcValue'),
          interval: positive(args.intervalSeconds, 'interval')
        }
      }
    });
  }

  /**
   * Rebuilds an order from a body previously produced by {@link toBody}. The body
   * goes through the same checks as the builders; anything they refuse is a
   * `ConfigurationError`.
   */
  static fromJSON(value: unknown): CreateRecurringOrder {
    const result = CreateRecurringOrderBodySchema.safeParse(value);
    if (!result.success) {
      throw new JupiterError('ConfigurationError', formatIssues(result.error), { cause: result.error });
    }

    const { params, ...base } = result.data;
    if ('time' in params) {
      const { inAmount, numberOfOrders, interval, minPrice, maxPrice, startAt } = params.time;
      let order = CreateRecurringOrder.timeBased({ ...base, inAmount, numberOfOrders, intervalSeconds: interval });
      if (minPrice !== undefined) order = order.withMinPrice(minPrice);
      if (maxPrice !== undefined) order = order.withMaxPrice(maxPrice);
      return startAt !== undefined ? order.withStartAt(startAt) : order;
    }

    const { depositAmount, incrementUsdcValue, interval, startAt } = params.price;
    const order = CreateRecurringOrder.priceBased({
      ...base,
      depositAmount,
      incrementUsdcValue,
      intervalSeconds: interval
    });
    return startAt !== undefined ? order.withStartAt(startAt) : order;
  }

  /** Unix seconds. Applies to either schedule. */
  withStartAt(unixSeconds: number): CreateRecurringOrder {
    const startAt = toJsonInteger(unixSeconds, 'startAt');
    const params = this.body.params;
    if ('time' in params) {
      return this.withParams({ time: { ...params.time, startAt } });
    }
    return this.withParams({ price: { ...params.price, startAt } });
  }

  withMinPrice(minPrice: number): CreateRecurringOrder {
    const time = this.timeParams('minPrice');
    return this.withParams({ time: { ...time, minPrice: checkPrice(minPrice, 'minPrice') } });
  }

  withMaxPrice(maxPrice: number): CreateRecurringOrder {
    const time = this.timeParams('maxPrice');
    return this.withParams({ time: { ...time, maxPrice: checkPrice(maxPrice, 'maxPrice') } });
  }

  /** Returns a copy; changing it does not affect the order. */
  toBody(): CreateRecurringOrderBody {
    return structuredClone(this.body);
  }

  private timeParams(fieldName: string): TimeParams {
    const params = this.body.params;
    invariant('time' in params, `${fieldName} only applies to time-based orders`, {
      recurringType: this.recurringType
    });
    return params.time;
  }

  private withParams(params: RecurringOrderParams): CreateRecurringOrder {
    return new CreateRecurringOrder({ ...this.body, params });
  }

  private static base(args: OrderBase): Omit<CreateRecurringOrderBody, 'params'> {
    return {
      user: toAddress(args.user, 'user'),
      inputMint: assertNonEmpty(args.inputMint, 'inputMint'),
      outputMint: assertNonEmpty(args.outputMint, 'outputMint')
    };
  }
}
