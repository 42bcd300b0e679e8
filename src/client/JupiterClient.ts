import { PriceApi } from '../price/PriceApi.js';
import { RecurringApi } from '../recurring/RecurringApi.js';
import { SwapApi } from '../swap/SwapApi.js';
import { TriggerApi } from '../trigger/TriggerApi.js';
import { UltraApi } from '../ultra/UltraApi.js';
import { HttpTransport, JUPITER_LITE_API_URL, type HttpTransportConfig } from './HttpTransport.js';

export type JupiterClientConfig = Omit<HttpTransportConfig, 'baseUrl'> & {
  /** Defaults to {@link JUPITER_LITE_API_URL}. Use `JUPITER_API_URL` together with `apiKey`. */
  baseUrl?: string;
};

/**
 * Entry point. One instance can be shared: every call is independent and the
 * underlying axios instance pools connections.
 */
export class JupiterClient {
  readonly transport: HttpTransport;

  readonly swap: SwapApi;
  readonly ultra: UltraApi;
  readonly trigger: TriggerApi;
  readonly recurring: RecurringApi;
  readonly price: PriceApi;

  constructor(config: JupiterClientConfig = {}) {
    this.transport = new HttpTransport({ ...config, baseUrl: config.baseUrl ?? JUPITER_LITE_API_URL });

    this.swap = new SwapApi(this.transport);
    this.ultra = new UltraApi(this.transport);
    this.trigger = new TriggerApi(this.transport);
    this.recurring = new RecurringApi(this.transport);
    this.price = new PriceApi(this.transport);
  }

  get baseUrl(): string {
    return this.transport.baseUrl;
  }
}
