import express, { type Express } from "express";
import type { RouteServices } from "../services";
import { errorMessage } from "../../services/errors";
import type { PaymentWebhookEvent } from "../../services/payments/stripeInvoicingProvider";

/**
 * Stripe webhook. Must be registered BEFORE express.json(): signature
 * verification needs the raw body.
 */
export function registerPaymentRoutes(app: Express, { billing, invoicing }: Pick<RouteServices, "billing" | "invoicing">) {
    app.post('/api/payments/webhook', express.raw({ type: 'application/json' }), async (req, res) => {
        if (!invoicing) {
            return res.status(503).json({ message: "Payments not configured" });
        }

        const signature = req.header('stripe-signature');
        if (!signature) {
            return res.status(400).json({ message: "Missing stripe-signature" });
        }
        if (!Buffer.isBuffer(req.body)) {
            console.error('[Stripe Webhook] req.body is not a Buffer');
            return res.status(500).json({ message: "Webhook processing error" });
        }

        let event: PaymentWebhookEvent | null;
        try {
            event = invoicing.parseWebhookEvent(req.body, signature);
        } catch (error) {
            console.error('[Stripe Webhook] Signature verification failed:', errorMessage(error));
            return res.status(400).json({ message: "Invalid webhook signature" });
        }

        try {
            if (!event) {
                return res.json({ received: true });
            }
            const result = event.kind === 'paid'
                ? await billing.confirmPayment(event.chargeId)
                : await billing.reissueInvoice(event.chargeId);
            console.log(`[Stripe Webhook] ${event.kind} ${event.chargeId}: ${result.status}`);
            res.json({ received: true, status: result.status });
        } catch (error) {
            // Non-2xx makes Stripe redeliver; settlement is idempotent
            console.error('[Stripe Webhook] Error:', error);
            res.status(500).json({ message: "Webhook processing error" });
        }
    });
}
