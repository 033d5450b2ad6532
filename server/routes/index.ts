import type { Express } from "express";
import { createServer, type Server } from "http";
import { registerAgentRoutes } from "./agent";
import { registerAdminRoutes } from "./admin";
import type { RouteServices } from "./services";

export function registerRoutes(app: Express, services: RouteServices): Server {
    app.get('/health', (_req, res) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    registerAgentRoutes(app, services);
    registerAdminRoutes(app, services);

    return createServer(app);
}
