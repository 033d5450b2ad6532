import express, { type Express, type Request, type Response, type NextFunction } from "express";
import type { Server } from "http";
import { registerRoutes } from "./routes";
import { registerPaymentRoutes } from "./routes/payments";
import type { RouteServices } from "./routes/services";
import { errorMessage } from "./services/errors";
import { log } from "./log";

export function createApp(services: RouteServices): { app: Express; server: Server } {
  const app = express();

  // ========== STRIPE WEBHOOK ROUTE (MUST be registered BEFORE express.json()) ==========
  registerPaymentRoutes(app, services);

  // Now apply JSON middleware for all other routes
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });

    next();
  });

  const server = registerRoutes(app, services);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[express] Unhandled error:", err);
    if (!res.headersSent) {
      res.status(500).json({ message: errorMessage(err) || "Internal Server Error" });
    }
  });

  return { app, server };
}
