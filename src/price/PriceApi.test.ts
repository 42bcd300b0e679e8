import { describe, expect, it } from 'vitest';

import { HttpTransport } from '../client/HttpTransport.js';
import { FakeHttp, jsonReply } from '../testing/fakeHttp.js';
import { PriceApi } from './PriceApi.js';
import { TokenPriceRequest } from './TokenPriceRequest.js';

const SOL = 'So11111111111111111111111111111111111111112';
const USDC = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
const UNKNOWN = 'Unknown1111111111111111111111111111111111111';

describe('TokenPriceRequest', () => {
  it('requires at least one mint', () => {
    expect(() => TokenPriceRequest.create([])).toThrow('mints must contain at least one entry');
  });

  it('cannot combine vsToken with extra info', () => {
    const request = TokenPriceRequest.create([SOL]).withVsToken(USDC);

    expect(() => request.withShowExtraInfo(true)).toThrow('vsToken cannot be combined with showExtraInfo');
    expect(() => TokenPriceRequest.create([SOL]).withShowExtraInfo(true).withVsToken(USDC)).toThrow(
      'vsToken cannot be combined with showExtraInfo'
    );
    expect(request.withShowExtraInfo(false).params.showExtraInfo).toBe(false);
  });
});

describe('PriceApi', () => {
  it('looks up several mints in one call', async () => {
    const fake = new FakeHttp(
      jsonReply({
        data: {
          [SOL]: { id: SOL, type: 'derivedPrice', price: '148.513927' },
          [USDC]: { id: USDC, type: 'derivedPrice', price: '1.000061' },
          [UNKNOWN]: null
        },
        timeTaken: 0.0031
      })
    );
    const prices = new PriceApi(new HttpTransport({ baseUrl: 'https://jup.test', http: fake.http }));

    const response = await prices.getPrices(TokenPriceRequest.create([SOL, USDC, UNKNOWN]));

    expect(fake.last.url.pathname).toBe('/price/v2');
    expect(fake.last.url.search).toBe(`?ids=${SOL}%2C${USDC}%2C${UNKNOWN}`);
    expect(Number.parseFloat(response.data[USDC]?.price ?? 'NaN')).toBeCloseTo(1, 2);
    expect(response.data[SOL]?.price).toBe('148.513927');
    expect(response.data[UNKNOWN]).toBeNull();
  });
});
