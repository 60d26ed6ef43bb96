import type {
    Catalog,
    LoadOptions,
    LoadResult
} from "../types/catalog-types";
import { loadCatalogFromFile } from "./loader/fileSource";

/**
 * Holds the latest load for one caller (the HTTP server or a CLI session).
 * Each reload replaces the previous catalog wholesale.
 */
export class CatalogSession {
    private latest: LoadResult | null = null;

    constructor(
        private filePath: string,
        private readonly options: LoadOptions = {}
    ) {}

    async reload(filePath: string = this.filePath): Promise<LoadResult> {
        this.filePath = filePath;
        this.latest = await loadCatalogFromFile(filePath, this.options);
        return this.latest;
    }

    getFilePath(): string {
        return this.filePath;
    }

    getLatest(): LoadResult | null {
        return this.latest;
    }

    /**
     * True once a load produced at least one course
     */
    hasData(): boolean {
        return this.latest !== null && this.latest.catalog.size > 0;
    }

    getCatalog(): Catalog {
        return this.latest?.catalog ?? new Map();
    }
}
