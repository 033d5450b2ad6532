import type { Express, Request, Response } from "express";
import {
    manualTransactionSchema, statsPeriodSchema, tradeReportSchema, type FollowerUser,
} from "@shared/schema";
import { z } from "zod";
import { sendServiceError, type RouteServices } from "../services";

const initializePortfolioSchema = z.object({
    initial_capital: z.coerce.number().positive(),
});

const historyQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50),
});

/**
 * Routes called by a follower's trading agent, authenticated with the
 * agent key in X-API-Key.
 */
export function registerAgentRoutes(app: Express, services: RouteServices) {
    const { store, billing, balance } = services;

    const authenticate = async (req: Request, res: Response): Promise<FollowerUser | null> => {
        const apiKey = req.header('X-API-Key');
        if (!apiKey) {
            res.status(401).json({ message: "Missing X-API-Key header" });
            return null;
        }
        const user = await store.getUserByApiKey(apiKey);
        if (!user || !user.access_granted) {
            res.status(401).json({ message: "Invalid API key" });
            return null;
        }
        return user;
    };

    app.post('/api/report-pnl', async (req, res) => {
        try {
            const user = await authenticate(req, res);
            if (!user) return;

            const parseResult = tradeReportSchema.safeParse(req.body);
            if (!parseResult.success) {
                return res.status(400).json({
                    message: "Invalid trade report",
                    errors: parseResult.error.flatten().fieldErrors
                });
            }

            const trade = await billing.recordTradeResult(user.id, parseResult.data);
            const updated = await store.getUser(user.id);
            res.json({
                status: "recorded",
                trade_id: trade.id,
                fee_charged: trade.fee_charged,
                cycle_profit: updated?.current_cycle_profit ?? null,
                cycle_fees: updated?.current_cycle_fees ?? null,
            });
        } catch (error) {
            sendServiceError(res, error, "Report PnL");
        }
    });

    app.get('/api/billing/status', async (req, res) => {
        try {
            const user = await authenticate(req, res);
            if (!user) return;

            const cycles = await store.getBillingCycles(user.id, 12);
            res.json({
                fee_tier: billing.getTierDisplay(user.fee_tier),
                next_cycle_fee_tier: user.next_cycle_fee_tier ? billing.getTierDisplay(user.next_cycle_fee_tier) : null,
                billing_cycle_start: user.billing_cycle_start,
                current_cycle_profit: user.current_cycle_profit,
                current_cycle_trades: user.current_cycle_trades,
                current_cycle_fees: user.current_cycle_fees,
                pending_invoice_id: user.pending_invoice_id,
                pending_invoice_amount: user.pending_invoice_amount,
                total_fees_paid: user.total_fees_paid,
                cycles,
            });
        } catch (error) {
            sendServiceError(res, error, "Billing Status");
        }
    });

    app.post('/api/portfolio/initialize', async (req, res) => {
        try {
            const user = await authenticate(req, res);
            if (!user) return;

            const parseResult = initializePortfolioSchema.safeParse(req.body);
            if (!parseResult.success) {
                return res.status(400).json({
                    message: "Invalid request body",
                    errors: parseResult.error.flatten().fieldErrors
                });
            }

            res.json(await balance.initializePortfolio(user.id, parseResult.data.initial_capital));
        } catch (error) {
            sendServiceError(res, error, "Portfolio Initialize");
        }
    });

    app.post('/api/portfolio/transactions', async (req, res) => {
        try {
            const user = await authenticate(req, res);
            if (!user) return;

            const parseResult = manualTransactionSchema.safeParse(req.body);
            if (!parseResult.success) {
                return res.status(400).json({
                    message: "Invalid transaction",
                    errors: parseResult.error.flatten().fieldErrors
                });
            }

            const { type, amount, notes } = parseResult.data;
            const transaction = await balance.recordManualTransaction(user.id, type, amount, notes);
            res.status(201).json(transaction);
        } catch (error) {
            sendServiceError(res, error, "Portfolio Transaction");
        }
    });

    app.get('/api/portfolio/transactions', async (req, res) => {
        try {
            const user = await authenticate(req, res);
            if (!user) return;

            const query = historyQuerySchema.safeParse(req.query);
            if (!query.success) {
                return res.status(400).json({ message: "Invalid limit" });
            }
            res.json(await balance.getTransactionHistory(user.id, query.data.limit));
        } catch (error) {
            sendServiceError(res, error, "Portfolio Transactions");
        }
    });

    app.get('/api/portfolio/summary', async (req, res) => {
        try {
            const user = await authenticate(req, res);
            if (!user) return;

            const summary = await balance.getBalanceSummary(user.id);
            if (!summary) {
                return res.status(404).json({ message: "User not found" });
            }
            res.json(summary);
        } catch (error) {
            sendServiceError(res, error, "Portfolio Summary");
        }
    });

    app.get('/api/portfolio/stats', async (req, res) => {
        try {
            const user = await authenticate(req, res);
            if (!user) return;

            const query = statsPeriodSchema.safeParse(req.query);
            if (!query.success) {
                return res.status(400).json({
                    message: "Invalid period",
                    errors: query.error.flatten().fieldErrors
                });
            }
            res.json(await balance.getPerformanceStats(user.id, query.data.period));
        } catch (error) {
            sendServiceError(res, error, "Portfolio Stats");
        }
    });
}
