import { Router } from "express";
import { CatalogSession } from "../services/catalogSession";
import { listCourses, getCourse, getDiagnostics } from "../controllers/catalogController";

export function catalogRoutes(session: CatalogSession): Router {
    const router = Router();

    // Define route to fetch every course sorted by course number
    router.get("/courses", listCourses(session));

    // Define route to fetch one course and its prerequisites by course number
    router.get("/courses/:code", getCourse(session));

    // Define route to fetch the rejected rows of the latest load
    router.get("/diagnostics", getDiagnostics(session));

    return router;
}
