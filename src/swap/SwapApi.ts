import type { HttpTransport } from '../client/HttpTransport.js';
import { QuoteResponseSchema, type QuoteResponse } from '../types/Quote.js';
import {
  ProgramIdToLabelSchema,
  SwapInstructionsSchema,
  SwapResponseSchema,
  type ProgramIdToLabel,
  type SwapInstructions,
  type SwapResponse
} from '../types/Swap.js';
import type { QuoteRequest } from './QuoteRequest.js';
import type { SwapRequest } from './SwapRequest.js';

export class SwapApi {
  constructor(readonly transport: HttpTransport) {}

  async getQuote(request: QuoteRequest): Promise<QuoteResponse> {
    return this.transport.get('/swap/v1/quote', QuoteResponseSchema, request.toQueryParams());
  }

  /** Builds an unsigned, base64-encoded swap transaction for the quote in `request`. */
  async getSwapTransaction(request: SwapRequest): Promise<SwapResponse> {
    return this.transport.post('/swap/v1/swap', SwapResponseSchema, request.toBody());
  }

  /** Same inputs as {@link getSwapTransaction}, returned as individual instructions. */
  async getSwapInstructions(request: SwapRequest): Promise<SwapInstructions> {
    return this.transport.post('/swap/v1/swap-instructions', SwapInstructionsSchema, request.toBody());
  }

  async getProgramIdToLabel(): Promise<ProgramIdToLabel> {
    return this.transport.get('/swap/v1/program-id-to-label', ProgramIdToLabelSchema);
  }
}
