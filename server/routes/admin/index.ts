import type { Express, NextFunction, Request, Response } from "express";
import crypto from "crypto";
import { z } from "zod";
import { tierChangeSchema } from "@shared/schema";
import { sendServiceError, type RouteServices } from "../services";

const reconcileSchema = z.object({
    lookback_days: z.coerce.number().int().min(1).max(365).optional(),
});

function passwordsMatch(given: string, expected: string): boolean {
    const a = crypto.createHash('sha256').update(given).digest();
    const b = crypto.createHash('sha256').update(expected).digest();
    return crypto.timingSafeEqual(a, b);
}

export function requireAdminPassword(adminPassword: string | undefined) {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!adminPassword) {
            return res.status(503).json({ message: "Admin access not configured" });
        }
        const given = req.header('X-Admin-Password');
        if (!given || !passwordsMatch(given, adminPassword)) {
            return res.status(401).json({ message: "Unauthorized" });
        }
        next();
    };
}

export function registerAdminRoutes(app: Express, services: RouteServices) {
    const { store, billing, balance, trades } = services;
    const isAdmin = requireAdminPassword(services.adminPassword);

    // ========== BILLING ==========
    app.post('/api/admin/billing/check-cycles', isAdmin, async (_req, res) => {
        try {
            res.json(await billing.checkAllCycles());
        } catch (error) {
            sendServiceError(res, error, "Admin Billing");
        }
    });

    app.post('/api/admin/billing/start-cycle/:userId', isAdmin, async (req, res) => {
        try {
            const started = await billing.startBillingCycle(req.params.userId);
            res.json({ started, message: started ? "Billing cycle started" : "Billing cycle already running or user not found" });
        } catch (error) {
            sendServiceError(res, error, "Admin Billing");
        }
    });

    app.post('/api/admin/billing/tier/:userId', isAdmin, async (req, res) => {
        try {
            const parseResult = tierChangeSchema.safeParse(req.body);
            if (!parseResult.success) {
                return res.status(400).json({
                    message: "Invalid tier",
                    errors: parseResult.error.flatten().fieldErrors
                });
            }
            const scheduled = await billing.scheduleTierChange(req.params.userId, parseResult.data.tier);
            if (!scheduled) {
                return res.status(404).json({ message: "User not found" });
            }
            res.json({ next_cycle_fee_tier: billing.getTierDisplay(parseResult.data.tier) });
        } catch (error) {
            sendServiceError(res, error, "Admin Billing");
        }
    });

    app.get('/api/admin/billing/summary', isAdmin, async (_req, res) => {
        try {
            res.json(await billing.getBillingSummary());
        } catch (error) {
            sendServiceError(res, error, "Admin Billing");
        }
    });

    // Waives the pending fee: the open charge is cancelled, nothing is collected
    app.post('/api/admin/billing/waive-fees/:userId', isAdmin, async (req, res) => {
        try {
            res.json(await billing.cancelInvoice(req.params.userId));
        } catch (error) {
            sendServiceError(res, error, "Admin Billing");
        }
    });

    app.post('/api/admin/billing/send-invoice/:userId', isAdmin, async (req, res) => {
        try {
            res.json(await billing.resendInvoice(req.params.userId));
        } catch (error) {
            sendServiceError(res, error, "Admin Billing");
        }
    });

    app.get('/api/admin/billing/:userId/cycles', isAdmin, async (req, res) => {
        try {
            res.json(await store.getBillingCycles(req.params.userId));
        } catch (error) {
            sendServiceError(res, error, "Admin Billing");
        }
    });

    // ========== PORTFOLIO ==========
    app.post('/api/admin/portfolio/check-balances', isAdmin, async (_req, res) => {
        try {
            res.json(await balance.checkAllUsers());
        } catch (error) {
            sendServiceError(res, error, "Admin Portfolio");
        }
    });

    app.get('/api/admin/portfolio/:userId/summary', isAdmin, async (req, res) => {
        try {
            const summary = await balance.getBalanceSummary(req.params.userId);
            if (!summary) {
                return res.status(404).json({ message: "User not found" });
            }
            res.json(summary);
        } catch (error) {
            sendServiceError(res, error, "Admin Portfolio");
        }
    });

    // ========== TRADES ==========
    app.post('/api/admin/trades/reconcile', isAdmin, async (_req, res) => {
        try {
            res.json(await trades.reconcileAllUsers());
        } catch (error) {
            sendServiceError(res, error, "Admin Trades");
        }
    });

    app.post('/api/admin/trades/reconcile/:userId', isAdmin, async (req, res) => {
        try {
            const parseResult = reconcileSchema.safeParse(req.body ?? {});
            if (!parseResult.success) {
                return res.status(400).json({ message: "Invalid lookback_days" });
            }
            res.json(await trades.reconcileUser(req.params.userId, parseResult.data.lookback_days));
        } catch (error) {
            sendServiceError(res, error, "Admin Trades");
        }
    });
}
