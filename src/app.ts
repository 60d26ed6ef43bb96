import express from "express";
import cors from "cors";

import { config } from "./config/env";
import { CatalogSession } from "./services/catalogSession";
import { HttpError } from "./errors/httpError";
import { catalogRoutes } from "./routes/catalog-routes";
import { adminCatalogRoutes } from "./routes/admin/catalog/reload";

export function createApp(session: CatalogSession): express.Express {
    const app = express();

    app.use(cors({
        origin: config.corsOrigin, // allow frontend to access backend
        credentials: true,
        methods: ['GET', 'POST'],
        allowedHeaders: ['Content-Type', 'Authorization']
    }));
    app.use(express.json());
    app.use("/api/catalog", catalogRoutes(session));
    app.use("/api/admin/catalog", adminCatalogRoutes(session));
    app.get("/api/test", (_req, res) => {
        res.json({ message: "Backend is alive!" });
    });

    app.get("/", (_req, res) => {
        res.send("course-advisor-backend is alive!");
    });

    // GLOBAL ERROR HANDLER
    app.use(errorHandler);

    return app;
}

export function errorHandler(
    err: unknown,
    _req: express.Request,
    res: express.Response,
    _next: express.NextFunction
): void {
    const statusCode = err instanceof HttpError ? err.statusCode : 500;
    if (statusCode >= 500) console.error(err);
    res.status(statusCode).json({
        error: err instanceof Error ? err.message : "Internal server error"
    });
}
