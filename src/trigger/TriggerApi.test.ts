import { describe, expect, it } from 'vitest';

import { HttpTransport } from '../client/HttpTransport.js';
import { FakeHttp, jsonReply } from '../testing/fakeHttp.js';
import { CreateTriggerOrder } from './CreateTriggerOrder.js';
import { GetTriggerOrders } from './GetTriggerOrders.js';
import { TriggerApi } from './TriggerApi.js';

const SOL = 'So11111111111111111111111111111111111111112';
const USDC = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
const MAKER = 'MakerWa11et1111111111111111111111111111111';

function api(fake: FakeHttp): TriggerApi {
  return new TriggerApi(new HttpTransport({ baseUrl: 'https://jup.test', http: fake.http }));
}

const order = CreateTriggerOrder.create({
  inputMint: USDC,
  outputMint: SOL,
  maker: MAKER,
  payer: MAKER,
  makingAmount: 10_000_000n,
  takingAmount: '50000000'
});

describe('CreateTriggerOrder', () => {
  it('nests amounts under params as strings', () => {
    const body = order.withSlippageBps(0).withExpiredAt(1_760_000_000).withComputeUnitPrice(1000).toBody();

    expect(JSON.stringify(body)).toBe(
      JSON.stringify({
        inputMint: USDC,
        outputMint: SOL,
        maker: MAKER,
        payer: MAKER,
        params: { makingAmount: '10000000', takingAmount: '50000000', expiredAt: '1760000000', slippageBps: '0' },
        computeUnitPrice: '1000'
      })
    );
  });

  it('rejects invalid settings', () => {
    expect(() => order.withComputeUnitPrice(-1)).toThrow('computeUnitPrice must be "auto" or a non-negative integer');
    expect(() => order.withExpiredAt('tomorrow')).toThrow('expiredAt must be a unix timestamp in seconds');
    expect(() =>
      CreateTriggerOrder.create({
        inputMint: USDC,
        outputMint: SOL,
        maker: MAKER,
        payer: MAKER,
        makingAmount: 0,
        takingAmount: 1
      })
    ).toThrow('makingAmount must be > 0');
  });
});

describe('TriggerApi', () => {
  it('creates an order', async () => {
    const fake = new FakeHttp(jsonReply({ order: 'Order111', transaction: 'AQID', requestId: 'req-1' }));

    const created = await api(fake).createOrder(order.withComputeUnitPrice('auto'));

    expect(fake.last.url.pathname).toBe('/trigger/v1/createOrder');
    expect(fake.lastJson).toEqual({
      inputMint: USDC,
      outputMint: SOL,
      maker: MAKER,
      payer: MAKER,
      params: { makingAmount: '10000000', takingAmount: '50000000' },
      computeUnitPrice: 'auto'
    });
    expect(created.order).toBe('Order111');
  });

  it('executes a signed order', async () => {
    const fake = new FakeHttp(jsonReply({ signature: 'sig-1', status: 'Success' }));

    const result = await api(fake).executeOrder({ requestId: 'req-1', signedTransaction: 'AQID' });

    expect(fake.last.url.pathname).toBe('/trigger/v1/execute');
    expect(fake.last.body).toBe('{"requestId":"req-1","signedTransaction":"AQID"}');
    expect(result.signature).toBe('sig-1');
    expect(result.code).toBeUndefined();
  });

  it('cancels one order or all of them', async () => {
    const fake = new FakeHttp(
      jsonReply({ transaction: 'AQID', requestId: 'req-2' }),
      jsonReply({ transactions: ['AQID', 'BAUG'], requestId: 'req-3' })
    );
    const trigger = api(fake);

    await trigger.cancelOrder({ maker: MAKER, order: 'Order111', computeUnitPrice: 'auto' });
    expect(fake.last.url.pathname).toBe('/trigger/v1/cancelOrder');
    expect(fake.last.body).toBe(`{"maker":"${MAKER}","order":"Order111","computeUnitPrice":"auto"}`);

    const all = await trigger.cancelOrders({ maker: MAKER });
    expect(fake.last.url.pathname).toBe('/trigger/v1/cancelOrders');
    expect(fake.last.body).toBe(`{"maker":"${MAKER}"}`);
    expect(all.transactions).toEqual(['AQID', 'BAUG']);
  });

  it('lists order history', async () => {
    const fake = new FakeHttp(
      jsonReply({
        user: MAKER,
        orderStatus: 'history',
        orders: [
          {
            orderKey: 'Order111',
            inputMint: USDC,
            outputMint: SOL,
            makingAmount: '10',
            takingAmount: '0.05',
            status: 'Completed',
            expiredAt: null
          }
        ],
        totalPages: 1,
        page: 2
      })
    );

    const page = await api(fake).getOrders(GetTriggerOrders.create(MAKER, 'history').withPage(2).withInputMint(USDC));

    expect(fake.last.url.pathname).toBe('/trigger/v1/getTriggerOrders');
    expect(fake.last.url.search).toBe(`?user=${MAKER}&orderStatus=history&page=2&inputMint=${USDC}`);
    expect(page.orders[0]?.status).toBe('Completed');
    expect(page.page).toBe(2);
  });
});
