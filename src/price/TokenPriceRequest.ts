import type { QueryParams } from '../codec/wire.js';
import { toAddress, toAddressList, type AddressInput } from '../utils/encoding.js';
import { assertNonEmptyList, invariant } from '../utils/invariant.js';

export type TokenPriceParams = {
  readonly mints: readonly string[];
  /** Quote prices in this token instead of USDC. */
  readonly vsToken?: string;
  readonly showExtraInfo?: boolean;
};

/** Query for `GET /price/v2`. */
export class TokenPriceRequest {
  private constructor(readonly params: TokenPriceParams) {}

  static create(mints: readonly AddressInput[]): TokenPriceRequest {
    const list = toAddressList(mints, 'mints');
    assertNonEmptyList(list, 'mints');
    return new TokenPriceRequest({ mints: list });
  }

  withVsToken(vsToken: AddressInput): TokenPriceRequest {
    return this.with({ vsToken: toAddress(vsToken, 'vsToken') });
  }

  withShowExtraInfo(showExtraInfo: boolean): TokenPriceRequest {
    return this.with({ showExtraInfo });
  }

  toQueryParams(): QueryParams {
    const p = this.params;
    return {
      ids: p.mints,
      vsToken: p.vsToken,
      showExtraInfo: p.showExtraInfo
    };
  }

  private with(patch: Partial<TokenPriceParams>): TokenPriceRequest {
    const params = { ...this.params, ...patch };
    invariant(
      !(params.vsToken !== undefined && params.showExtraInfo === true),
      'vsToken cannot be combined with showExtraInfo'
    );
    return new TokenPriceRequest(params);
  }
}
