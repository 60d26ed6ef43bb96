import { Request, Response, NextFunction } from "express";
import { auth } from "../config/firebase";

export async function verifyToken(req: Request, res: Response, next: NextFunction): Promise<void> {
    // The id token should be in the Authorization header
    const header = req.headers.authorization;

    if (!header) {
        res.status(401).json({ error: "No token provided" });
        return;
    }

    // Accept both "Bearer <token>" and a bare token
    const idToken = header.startsWith("Bearer ") ? header.slice("Bearer ".length) : header;

    try {
        await auth.verifyIdToken(idToken);
    } catch {
        res.status(401).json({ error: "Invalid or expired token" });
        return;
    }
    next();
}
