import { Router } from "express";
import { CatalogSession } from "../../../services/catalogSession";
import { reloadCatalog } from "../../../controllers/catalogController";
import { verifyToken } from "../../../middlewares/verifyToken";

export function adminCatalogRoutes(session: CatalogSession): Router {
    const router = Router();

    // Define route to re-read the course data file (admin only)
    router.post("/reload", verifyToken, reloadCatalog(session));

    return router;
}
