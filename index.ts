export * from './src/client/JupiterClient.js';
export * from './src/client/HttpTransport.js';
export * from './src/client/JupiterLogger.js';

export * from './src/swap/SwapApi.js';
export * from './src/swap/QuoteRequest.js';
export * from './src/swap/SwapRequest.js';

export * from './src/ultra/UltraApi.js';
export * from './src/ultra/UltraOrderRequest.js';

export * from './src/trigger/TriggerApi.js';
export * from './src/trigger/CreateTriggerOrder.js';
export * from './src/trigger/GetTriggerOrders.js';

export * from './src/recurring/RecurringApi.js';
export * from './src/recurring/CreateRecurringOrder.js';
export * from './src/recurring/GetRecurringOrders.js';

export * from './src/price/PriceApi.js';
export * from './src/price/TokenPriceRequest.js';

export * from './src/types/Quote.js';
export * from './src/types/Swap.js';
export * from './src/types/Ultra.js';
export * from './src/types/Orders.js';
export * from './src/types/Trigger.js';
export * from './src/types/Recurring.js';
export * from './src/types/Price.js';

export * from './src/errors/JupiterError.js';

export * from './src/codec/wire.js';
export * from './src/codec/decode.js';

export * from './src/utils/math.js';
export * from './src/utils/invariant.js';
export * from './src/utils/encoding.js';
export * from './src/utils/transactions.js';
