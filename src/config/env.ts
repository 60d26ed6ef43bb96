import dotenv from "dotenv";
import path from "path";

// Load correct .env variables (local v. production)
dotenv.config({
    path: process.env.NODE_ENV === "production"
        ? path.resolve(process.cwd(), ".env.production")
        : path.resolve(process.cwd(), ".env"),
});

export interface AppConfig {
    port: number;
    corsOrigin: string;
    catalogFile: string;
    catalogDelimiter: string;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const catalogDelimiter = env.CATALOG_DELIMITER ?? ",";
    if (catalogDelimiter.length !== 1) {
        throw new Error("Invalid .env variable: CATALOG_DELIMITER must be a single character");
    }

    return {
        port: Number(env.PORT) || 4000,
        corsOrigin: env.CORS_ORIGIN || "http://localhost:3000",
        catalogFile: path.resolve(process.cwd(), env.CATALOG_FILE || "data/courses.csv"),
        catalogDelimiter
    };
}

export const config = readConfig();
