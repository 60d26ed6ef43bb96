import type {
    Catalog,
    CourseSummary,
    LookupResult,
    ResolvedPrerequisite
} from "../types/catalog-types";
import { normalizeCourseKey } from "./validator/recordValidator";

// Plain code-unit ordering; keys are already uppercase.
function compareKeys(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * All courses ordered by course number
 */
export function listSorted(catalog: Catalog): CourseSummary[] {
    return Array.from(catalog.values())
        .map(({ key, title }) => ({ key, title }))
        .sort((a, b) => compareKeys(a.key, b.key));
}

/**
 * One course with its prerequisite titles resolved.
 * A miss is a normal result carrying the normalized key that was searched.
 */
export function lookup(catalog: Catalog, rawKey: string): LookupResult {
    const key = normalizeCourseKey(rawKey);
    const course = catalog.get(key);
    if (!course) return { found: false, key };

    const prerequisites = course.prerequisiteKeys.map((prereqKey): ResolvedPrerequisite => {
        const prereq = catalog.get(prereqKey);
        // Should not happen after load-time validation
        if (!prereq) return { key: prereqKey, resolved: false };
        return { key: prereq.key, title: prereq.title, resolved: true };
    });

    return {
        found: true,
        course: { key: course.key, title: course.title },
        prerequisites
    };
}
