import Stripe from 'stripe';
import { InvoicingError, errorMessage } from '../errors';
import { formatUsd, roundCurrency } from '../billing/money';

export interface ChargeRequest {
  userId: string;
  email: string;
  amountUsd: string;
  profitUsd: string;
  cycleStart: Date;
  cycleEnd: Date;
}

export interface Charge {
  chargeId: string;
  hostedUrl: string | null;
}

export interface InvoicingProvider {
  createCharge(request: ChargeRequest): Promise<Charge>;
  /** Makes an open charge unpayable. */
  cancelCharge(chargeId: string): Promise<void>;
}

/**
 * Settlement outcome carried by a verified webhook; null for events we do
 * not act on. `expired` means the session ended unpaid and can no longer be
 * paid; the fee is still owed.
 */
export type PaymentWebhookEvent =
  | { kind: 'paid'; chargeId: string }
  | { kind: 'expired'; chargeId: string };

export interface StripeInvoicingOptions {
  secretKey: string;
  webhookSecret: string | undefined;
  publicBaseUrl: string;
}

/**
 * Profit-share invoices as one-off Stripe Checkout sessions. The session id
 * is the charge id stored on the invoice.
 */
export class StripeInvoicingProvider implements InvoicingProvider {
  private readonly stripe: Stripe;

  constructor(private readonly options: StripeInvoicingOptions, client?: Stripe) {
    this.stripe = client ?? new Stripe(options.secretKey);
  }

  async createCharge(request: ChargeRequest): Promise<Charge> {
    const amountCents = roundCurrency(request.amountUsd).times(100).toNumber();
    if (amountCents <= 0) {
      throw new InvoicingError(`Refusing to create a charge of ${formatUsd(request.amountUsd)}`);
    }

    const cycleStart = request.cycleStart.toISOString().slice(0, 10);
    const cycleEnd = request.cycleEnd.toISOString().slice(0, 10);
    const metadata = {
      user_id: request.userId,
      profit_usd: request.profitUsd,
      cycle_start: request.cycleStart.toISOString(),
      cycle_end: request.cycleEnd.toISOString(),
    };

    try {
      const session = await this.stripe.checkout.sessions.create({
        payment_method_types: ['card'],
        line_items: [
          {
            price_data: {
              currency: 'usd',
              product_data: {
                name: 'Profit share fee',
                description: `Cycle ${cycleStart} to ${cycleEnd}, profit ${formatUsd(request.profitUsd)}`,
              },
              unit_amount: amountCents,
            },
            quantity: 1,
          },
        ],
        mode: 'payment',
        success_url: `${this.options.publicBaseUrl}/billing/success?session_id={CHECKOUT_SESSION_ID}`,
        cancel_url: `${this.options.publicBaseUrl}/billing/cancelled`,
        customer_email: request.email,
        metadata,
        payment_intent_data: { metadata },
      });

      return { chargeId: session.id, hostedUrl: session.url };
    } catch (error) {
      throw new InvoicingError(`Stripe checkout session failed: ${errorMessage(error)}`, error);
    }
  }

  async cancelCharge(chargeId: string): Promise<void> {
    try {
      await this.stripe.checkout.sessions.expire(chargeId);
    } catch (error) {
      throw new InvoicingError(`Stripe session expiry failed: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Verifies the signature and maps checkout session events onto invoice
   * settlement. Throws when the signature does not match.
   */
  parseWebhookEvent(payload: Buffer, signature: string): PaymentWebhookEvent | null {
    if (!this.options.webhookSecret) {
      throw new InvoicingError('STRIPE_WEBHOOK_SECRET is not configured');
    }
    const event = this.stripe.webhooks.constructEvent(payload, signature, this.options.webhookSecret);

    switch (event.type) {
      case 'checkout.session.completed':
        // Delayed payment methods complete the session before the money arrives
        return event.data.object.payment_status === 'paid'
          ? { kind: 'paid', chargeId: event.data.object.id }
          : null;
      case 'checkout.session.async_payment_succeeded':
        return { kind: 'paid', chargeId: event.data.object.id };
      case 'checkout.session.expired':
      case 'checkout.session.async_payment_failed':
        return { kind: 'expired', chargeId: event.data.object.id };
      default:
        return null;
    }
  }
}
