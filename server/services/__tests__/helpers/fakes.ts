import type { CredentialVault, ExchangeCredentials } from '../../encryptionService';
import { CredentialDecryptionError, ExchangeGatewayError, InvoicingError } from '../../errors';
import type { ExchangeGateway, Fill } from '../../exchange/krakenGateway';
import type { Charge, ChargeRequest, InvoicingProvider } from '../../payments/stripeInvoicingProvider';

/** Hands the stored ciphertext back as the API key so gateways can key on it. */
export class FakeVault implements CredentialVault {
  configured = true;
  readonly unreadable = new Set<string>();

  isConfigured(): boolean {
    return this.configured;
  }

  decrypt(encryptedKey: string | null, encryptedSecret: string | null): ExchangeCredentials {
    if (!encryptedKey || !encryptedSecret || this.unreadable.has(encryptedKey)) {
      throw new CredentialDecryptionError('Failed to decrypt data');
    }
    return { apiKey: encryptedKey, apiSecret: 'test-secret' };
  }
}

export class FakeGateway implements ExchangeGateway {
  readonly balances = new Map<string, number>();
  readonly fills = new Map<string, Fill[]>();
  readonly failing = new Set<string>();
  readonly fillRequests: Array<{ apiKey: string; since: Date }> = [];

  async getBalance(credentials: ExchangeCredentials): Promise<number> {
    if (this.failing.has(credentials.apiKey)) {
      throw new ExchangeGatewayError('Kraken API error: 503 Service Unavailable', 'Balance', true);
    }
    return this.balances.get(credentials.apiKey) ?? 0;
  }

  async getFillsSince(credentials: ExchangeCredentials, since: Date): Promise<Fill[]> {
    this.fillRequests.push({ apiKey: credentials.apiKey, since });
    if (this.failing.has(credentials.apiKey)) {
      throw new ExchangeGatewayError('Kraken API error: 503 Service Unavailable', 'TradesHistory', true);
    }
    return this.fills.get(credentials.apiKey) ?? [];
  }
}

export class FakeInvoicingProvider implements InvoicingProvider {
  readonly requests: ChargeRequest[] = [];
  readonly cancelled: string[] = [];
  failing = false;
  private sequence = 0;

  async createCharge(request: ChargeRequest): Promise<Charge> {
    if (this.failing) {
      throw new InvoicingError('Stripe checkout session failed: provider unavailable');
    }
    this.requests.push(request);
    this.sequence++;
    return {
      chargeId: `cs_test_${this.sequence}`,
      hostedUrl: `https://checkout.example.com/cs_test_${this.sequence}`,
    };
  }

  async cancelCharge(chargeId: string): Promise<void> {
    if (this.failing) {
      throw new InvoicingError('Stripe session expiry failed: provider unavailable');
    }
    this.cancelled.push(chargeId);
  }
}
