import { describe, expect, it } from 'vitest';

import { HttpTransport } from '../client/HttpTransport.js';
import { JupiterError } from '../errors/JupiterError.js';
import { FakeHttp, jsonReply } from '../testing/fakeHttp.js';
import { CreateRecurringOrder } from './CreateRecurringOrder.js';
import { GetRecurringOrders } from './GetRecurringOrders.js';
import { RecurringApi } from './RecurringApi.js';

const SOL = 'So11111111111111111111111111111111111111112';
const USDC = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
const USER = 'UserWa11et111111111111111111111111111111111';

function api(fake: FakeHttp): RecurringApi {
  return new RecurringApi(new HttpTransport({ baseUrl: 'https://jup.test', http: fake.http }));
}

const timeOrder = CreateRecurringOrder.timeBased({
  user: USER,
  inputMint: USDC,
  outputMint: SOL,
  inAmount: 104_000_000,
  numberOfOrders: 2,
  intervalSeconds: 86_400
});

const priceOrder = CreateRecurringOrder.priceBased({
  user: USER,
  inputMint: USDC,
  outputMint: SOL,
  depositAmount: 1_000_000_000n,
  incrementUsdcValue: 100_000_000,
  intervalSeconds: 3600
});

describe('CreateRecurringOrder', () => {
  it('encodes a time schedule under a time key', () => {
    const body = timeOrder.withMinPrice(120.5).withStartAt(1_760_000_000).toBody();

    expect(JSON.stringify(body)).toBe(
      JSON.stringify({
        user: USER,
        inputMint: USDC,
        outputMint: SOL,
        params: {
          time: { inAmount: 104_000_000, numberOfOrders: 2, interval: 86_400, minPrice: 120.5, startAt: 1_760_000_000 }
        }
      })
    );
    expect(timeOrder.recurringType).toBe('time');
    expect(JSON.stringify(timeOrder.toBody().params)).toBe(
      '{"time":{"inAmount":104000000,"numberOfOrders":2,"interval":86400}}'
    );
  });

  it('encodes a price schedule under a price key', () => {
    expect(priceOrder.recurringType).toBe('price');
    expect(priceOrder.withStartAt(5).toBody().params).toEqual({
      price: { depositAmount: 1_000_000_000, incrementUsdcValue: 100_000_000, interval: 3600, startAt: 5 }
    });
  });

  it('refuses price bounds on a price-based order', () => {
    expect(() => priceOrder.withMinPrice(1)).toThrow('minPrice only applies to time-based orders');
    expect(() => priceOrder.withMaxPrice(1)).toThrow('maxPrice only applies to time-based orders');
  });

  it('decodes schedules by trying time first, then price', () => {
    const base = { user: USER, inputMint: USDC, outputMint: SOL };
    const time = { inAmount: 10, numberOfOrders: 2, interval: 60 };
    const price = { depositAmount: 10, incrementUsdcValue: 1, interval: 60 };

    expect(CreateRecurringOrder.fromJSON({ ...base, params: { price } }).recurringType).toBe('price');
    expect(CreateRecurringOrder.fromJSON({ ...base, params: { time, price } }).recurringType).toBe('time');

    let error: unknown;
    try {
      CreateRecurringOrder.fromJSON({ ...base, params: { hourly: time } });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(JupiterError);
    expect(error).toMatchObject({ code: 'ConfigurationError' });
  });

  it('applies the builder checks to decoded bodies', () => {
    const valid = { user: USER, inputMint: USDC, outputMint: SOL };

    expect(() =>
      CreateRecurringOrder.fromJSON({
        user: '',
        inputMint: '',
        outputMint: '',
        params: { time: { inAmount: -5, numberOfOrders: 1.5, interval: 0 } }
      })
    ).toThrow('user must be a non-empty string');
    expect(() =>
      CreateRecurringOrder.fromJSON({ ...valid, params: { time: { inAmount: -5, numberOfOrders: 2, interval: 60 } } })
    ).toThrow('inAmount must be a non-negative safe integer');
    expect(() =>
      CreateRecurringOrder.fromJSON({ ...valid, params: { time: { inAmount: 5, numberOfOrders: 1.5, interval: 60 } } })
    ).toThrow('numberOfOrders must be a non-negative safe integer');
    expect(() =>
      CreateRecurringOrder.fromJSON({ ...valid, params: { price: { depositAmount: 5, incrementUsdcValue: 1, interval: 0 } } })
    ).toThrow('interval must be > 0');
    expect(() =>
      CreateRecurringOrder.fromJSON({
        ...valid,
        params: { time: { inAmount: 5, numberOfOrders: 2, interval: 60, minPrice: -1 } }
      })
    ).toThrow('minPrice must be a finite, non-negative number');
    expect(() => CreateRecurringOrder.fromJSON({ ...valid, params: { time: { inAmount: '5' } } })).toThrow(JupiterError);
  });

  it('hands out copies of its body', () => {
    const body = timeOrder.toBody();
    if ('time' in body.params) body.params.time.inAmount = -7;
    body.user = 'someone-else';

    expect(timeOrder.toBody()).toEqual({
      user: USER,
      inputMint: USDC,
      outputMint: SOL,
      params: { time: { inAmount: 104_000_000, numberOfOrders: 2, interval: 86_400 } }
    });
  });

  it('round-trips through its JSON form', () => {
    const original = timeOrder.withMaxPrice(200);

    const restored = CreateRecurringOrder.fromJSON(JSON.parse(JSON.stringify(original.toBody())));

    expect(restored.toBody()).toEqual(original.toBody());
  });
});

describe('RecurringApi', () => {
  it('creates and executes an order', async () => {
    const fake = new FakeHttp(
      jsonReply({ requestId: 'req-1', transaction: 'AQID' }),
      jsonReply({ signature: 'sig-1', status: 'Success' })
    );
    const recurring = api(fake);

    const created = await recurring.createOrder(timeOrder);
    expect(fake.last.url.pathname).toBe('/recurring/v1/createOrder');
    expect(fake.lastJson).toEqual(timeOrder.toBody());

    const executed = await recurring.executeOrder({ requestId: created.requestId, signedTransaction: 'AQID' });
    expect(fake.last.url.pathname).toBe('/recurring/v1/execute');
    expect(executed.status).toBe('Success');
  });

  it('cancels, deposits and withdraws', async () => {
    const fake = new FakeHttp(
      jsonReply({ requestId: 'req-1', transaction: 'AQID' }),
      jsonReply({ requestId: 'req-2', transaction: 'AQID' }),
      jsonReply({ requestId: 'req-3', transaction: 'AQID' })
    );
    const recurring = api(fake);

    await recurring.cancelOrder({ order: 'Order111', recurringType: 'time', user: USER });
    expect(fake.last.url.pathname).toBe('/recurring/v1/cancelOrder');
    expect(fake.last.body).toBe(`{"order":"Order111","recurringType":"time","user":"${USER}"}`);

    await recurring.priceDeposit({ order: 'Order111', user: USER, amount: 5_000_000n });
    expect(fake.last.url.pathname).toBe('/recurring/v1/priceDeposit');
    expect(fake.last.body).toBe(`{"amount":5000000,"order":"Order111","user":"${USER}"}`);

    const withdrawn = await recurring.priceWithdraw({ order: 'Order111', user: USER, inputOrOutput: 'Out' });
    expect(fake.last.url.pathname).toBe('/recurring/v1/priceWithdraw');
    expect(fake.last.body).toBe(`{"order":"Order111","user":"${USER}","inputOrOutput":"Out"}`);
    expect(withdrawn.requestId).toBe('req-3');
  });

  it('lists orders starting from page one without failed transactions', async () => {
    const fake = new FakeHttp(
      jsonReply({ orderStatus: 'active', page: 1, totalPages: 1, user: USER, all: [{ orderKey: 'Order111' }] })
    );

    const orders = await api(fake).getOrders(GetRecurringOrders.create('all', 'active', USER));

    expect(fake.last.url.pathname).toBe('/recurring/v1/getRecurringOrders');
    expect(fake.last.url.search).toBe(`?recurringType=all&orderStatus=active&user=${USER}&page=1&includeFailedTx=false`);
    expect(orders.all).toEqual([{ orderKey: 'Order111' }]);
    expect(orders.time).toBeUndefined();
  });

  it('applies page, mint and failed-transaction filters', () => {
    const query = GetRecurringOrders.create('price', 'history', USER)
      .withPage(3)
      .withMint(SOL)
      .withIncludeFailedTx(true)
      .toQueryParams();

    expect(query).toEqual({
      recurringType: 'price',
      orderStatus: 'history',
      user: USER,
      page: 3,
      mint: SOL,
      includeFailedTx: true
    });
  });
});
