import fs from "node:fs/promises";
import type {
    LoadDiagnostic,
    LoadOptions,
    LoadResult
} from "../../types/catalog-types";

import { loadCatalog } from "./catalogLoader";

// Read every line of a file once; the handle is closed whatever happens.
export async function readLines(filePath: string): Promise<string[]> {
    const handle = await fs.open(filePath, "r");
    try {
        const content = await handle.readFile("utf-8");
        return content.split(/\r?\n/);
    } finally {
        await handle.close();
    }
}

/**
 * Load a catalog from a course data file. An unreadable file gives an
 * empty catalog with status "unreadable" instead of throwing.
 */
export async function loadCatalogFromFile(
    filePath: string,
    options: LoadOptions = {}
): Promise<LoadResult> {
    let lines: string[];
    try {
        lines = await readLines(filePath);
    } catch (err) {
        const diagnostic: LoadDiagnostic = {
            type: 'SOURCE_UNREADABLE',
            message: `Could not open file: ${filePath}`
        };
        console.error(`ERROR: ${diagnostic.message}`, err instanceof Error ? err.message : err);
        return { status: 'unreadable', catalog: new Map(), diagnostics: [diagnostic] };
    }

    const result = loadCatalog(lines, options);
    for (const diagnostic of result.diagnostics) {
        console.warn(`ERROR: ${diagnostic.message}`);
    }
    console.log(`Loaded ${result.catalog.size} courses from ${filePath}`);
    return result;
}
