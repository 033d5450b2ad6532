import crypto from 'crypto';
import { z } from 'zod';
import { ExchangeGatewayError } from '../errors';
import type { ExchangeCredentials } from '../encryptionService';

export type FillSide = 'buy' | 'sell';

/** One execution from the exchange's fill log. `timestamp` is epoch ms. */
export interface Fill {
  id: string;
  symbol: string;
  side: FillSide;
  price: number;
  amount: number;
  fee: number;
  timestamp: number;
}

export interface ExchangeGateway {
  /** Free quote-currency balance in USD. */
  getBalance(credentials: ExchangeCredentials): Promise<number>;
  /** Fills executed at or after `since`, oldest first. */
  getFillsSince(credentials: ExchangeCredentials, since: Date): Promise<Fill[]>;
}

const KRAKEN_API_URL = 'https://api.kraken.com';

// Checked in order; the first one present is the account's USD balance
const USD_BALANCE_KEYS = ['USDT', 'ZUSD', 'USD'] as const;

const krakenEnvelope = z.object({
  error: z.array(z.string()).default([]),
  result: z.unknown().optional(),
});

const balanceResult = z.record(z.string(), z.string());

const tradesHistoryResult = z.object({
  count: z.coerce.number().default(0),
  trades: z.record(z.string(), z.object({
    pair: z.string(),
    time: z.coerce.number(),
    type: z.enum(['buy', 'sell']),
    price: z.coerce.number(),
    vol: z.coerce.number(),
    fee: z.coerce.number().default(0),
  })).default({}),
});

export interface KrakenGatewayOptions {
  timeoutMs: number;
  baseUrl?: string;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  maxHistoryPages?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

function generateKrakenSignature(path: string, nonce: string, postData: string, apiSecret: Buffer): string {
  const sha256Hash = crypto.createHash('sha256').update(nonce + postData).digest();
  return crypto.createHmac('sha512', apiSecret).update(Buffer.concat([Buffer.from(path), sha256Hash])).digest('base64');
}

function isRateLimitError(errors: string[]): boolean {
  return errors.some(e => e.includes('Rate limit') || e.startsWith('EAPI:Rate'));
}

/**
 * Convert Kraken pair format (XXBTZUSD, SOLUSD) to BTC/USD style
 */
export function fromKrakenPair(krakenPair: string): string {
  let pair = krakenPair;
  const legacy = /^X([A-Z]{3})Z([A-Z]{3})$/.exec(pair);
  if (legacy) {
    pair = legacy[1] + legacy[2];
  }
  pair = pair.replace('XBT', 'BTC').replace('XDG', 'DOGE');

  if (pair.endsWith('USDT') || pair.endsWith('USDC')) {
    return pair.slice(0, -4) + '/' + pair.slice(-4);
  } else if (pair.endsWith('USD') || pair.endsWith('EUR')) {
    return pair.slice(0, -3) + '/' + pair.slice(-3);
  }
  return pair;
}

export class KrakenGateway implements ExchangeGateway {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxHistoryPages: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastNonce = 0;

  constructor(private readonly options: KrakenGatewayOptions) {
    this.baseUrl = options.baseUrl ?? KRAKEN_API_URL;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.maxHistoryPages = options.maxHistoryPages ?? 20;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? ((ms) => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async getBalance(credentials: ExchangeCredentials): Promise<number> {
    const result = balanceResult.safeParse(await this.privateRequest(credentials, 'Balance'));
    if (!result.success) {
      throw new ExchangeGatewayError('Unexpected Balance response', 'Balance');
    }

    for (const currency of USD_BALANCE_KEYS) {
      const raw = result.data[currency];
      if (raw !== undefined) {
        const balance = Number(raw);
        if (!Number.isFinite(balance)) {
          throw new ExchangeGatewayError(`Invalid ${currency} balance "${raw}"`, 'Balance');
        }
        return balance;
      }
    }
    return 0;
  }

  async getFillsSince(credentials: ExchangeCredentials, since: Date): Promise<Fill[]> {
    const start = Math.floor(since.getTime() / 1000).toString();
    const fills: Fill[] = [];
    let expected = 0;
    let exhausted = false;

    for (let page = 0; page < this.maxHistoryPages; page++) {
      const parsed = tradesHistoryResult.safeParse(
        await this.privateRequest(credentials, 'TradesHistory', { start, ofs: String(fills.length) }),
      );
      if (!parsed.success) {
        throw new ExchangeGatewayError('Unexpected TradesHistory response', 'TradesHistory');
      }

      const entries = Object.entries(parsed.data.trades);
      for (const [id, trade] of entries) {
        fills.push({
          id,
          symbol: fromKrakenPair(trade.pair),
          side: trade.type,
          price: trade.price,
          amount: trade.vol,
          fee: trade.fee,
          timestamp: Math.round(trade.time * 1000),
        });
      }

      expected = parsed.data.count;
      if (entries.length === 0 || fills.length >= expected) {
        exhausted = true;
        break;
      }
    }

    // Partial histories are never returned
    if (!exhausted) {
      throw new ExchangeGatewayError(
        `TradesHistory truncated: ${fills.length} of ${expected} fills after ${this.maxHistoryPages} pages`,
        'TradesHistory',
      );
    }

    return fills.sort((a, b) => a.timestamp - b.timestamp);
  }

  private nextNonce(): string {
    this.lastNonce = Math.max(Date.now() * 1000, this.lastNonce + 1);
    return this.lastNonce.toString();
  }

  private async privateRequest(
    credentials: ExchangeCredentials,
    endpoint: string,
    params: Record<string, string> = {},
  ): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.sendPrivateRequest(credentials, endpoint, params);
      } catch (error) {
        if (!(error instanceof ExchangeGatewayError) || !error.retryable || attempt >= this.maxRetries) {
          throw error;
        }
        const delay = this.retryBaseDelayMs * 2 ** attempt;
        console.warn(`[Kraken] ⏳ ${error.message} on ${endpoint}, retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }
  }

  private async sendPrivateRequest(
    credentials: ExchangeCredentials,
    endpoint: string,
    params: Record<string, string>,
  ): Promise<unknown> {
    const path = `/0/private/${endpoint}`;
    const nonce = this.nextNonce();
    const postData = new URLSearchParams({ nonce, ...params }).toString();
    const signature = generateKrakenSignature(path, nonce, postData, Buffer.from(credentials.apiSecret, 'base64'));

    let response: Response;
    try {
      response = await this.fetchImpl(this.baseUrl + path, {
        method: 'POST',
        headers: {
          'API-Key': credentials.apiKey,
          'API-Sign': signature,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: postData,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new ExchangeGatewayError(
        `Kraken request failed: ${error instanceof Error ? error.message : String(error)}`,
        endpoint,
      );
    }

    if (!response.ok) {
      const retryable = response.status === 429 || response.status >= 500;
      throw new ExchangeGatewayError(`Kraken API error: ${response.status} ${response.statusText}`, endpoint, retryable);
    }

    const envelope = krakenEnvelope.safeParse(await response.json());
    if (!envelope.success) {
      throw new ExchangeGatewayError('Malformed Kraken response', endpoint);
    }
    if (envelope.data.error.length > 0) {
      throw new ExchangeGatewayError(
        `Kraken API error: ${envelope.data.error.join(', ')}`,
        endpoint,
        isRateLimitError(envelope.data.error),
      );
    }
    return envelope.data.result;
  }
}
