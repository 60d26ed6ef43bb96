import { RequestHandler } from "express";
import { CatalogSession } from "../services/catalogSession";
import { listSorted, lookup } from "../services/query";
import { HttpError } from "../errors/httpError";
import type { Catalog } from "../types/catalog-types";

// A catalog must have been read before it can be queried (it may be empty)
function requireReadable(session: CatalogSession): Catalog {
    const latest = session.getLatest();
    if (!latest || latest.status !== 'loaded') {
        throw new HttpError(409, "Course data is not loaded");
    }
    return latest.catalog;
}

// Sorted listing of every course
export function listCourses(session: CatalogSession): RequestHandler {
    return (_req, res, next) => {
        try {
            const catalog = requireReadable(session);
            res.json({ success: true, courses: listSorted(catalog) });
        } catch (err) {
            next(err);
        }
    };
}

// One course with resolved prerequisite titles
export function getCourse(session: CatalogSession): RequestHandler {
    return (req, res, next) => {
        try {
            const catalog = requireReadable(session);
            const result = lookup(catalog, req.params.code);

            if (!result.found) {
                res.status(404).json({
                    success: false,
                    error: 'COURSE_NOT_FOUND',
                    message: `Course not found: ${result.key}`,
                    key: result.key
                });
                return;
            }

            res.json({ success: true, ...result });
        } catch (err) {
            next(err);
        }
    };
}

// Status and rejected rows of the latest load
export function getDiagnostics(session: CatalogSession): RequestHandler {
    return (_req, res, next) => {
        const latest = session.getLatest();
        if (!latest) {
            next(new HttpError(409, "Course data is not loaded"));
            return;
        }
        res.json({
            success: latest.status === 'loaded',
            status: latest.status,
            courseCount: latest.catalog.size,
            diagnostics: latest.diagnostics
        });
    };
}

// Re-read the configured course file, replacing the current catalog
export function reloadCatalog(session: CatalogSession): RequestHandler {
    return async (_req, res, next) => {
        try {
            const result = await session.reload();
            if (result.status === 'unreadable') {
                throw new HttpError(503, `Could not open file: ${session.getFilePath()}`);
            }

            console.log(`Catalog reloaded (${result.catalog.size} courses)`);
            res.json({
                success: true,
                status: result.status,
                courseCount: result.catalog.size,
                diagnostics: result.diagnostics
            });
        } catch (err) {
            // global error middleware in app.ts handles it
            next(err);
        }
    };
}
