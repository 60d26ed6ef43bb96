import type {
    CourseKey,
    ValidationResult
} from "../../types/catalog-types";

// Uppercases a course number for consistent matching ("cs200 " -> "CS200")
export function normalizeCourseKey(raw: string): CourseKey {
    return raw.trim().toUpperCase();
}

/**
 * Decide whether a tokenized line is a well-formed course declaration.
 * Only checks the line itself; prerequisite existence and duplicate keys
 * are the loader's job since they need every key first.
 */
export function validateTokens(tokens: readonly string[]): ValidationResult {
    // Must have at least course number + title
    if (tokens.length < 2) {
        return {
            ok: false,
            reason: 'MALFORMED_LINE',
            message: 'malformed: missing key or title'
        };
    }

    const key = normalizeCourseKey(tokens[0]);
    const title = tokens[1].trim();
    if (key === "" || title === "") {
        return {
            ok: false,
            reason: 'MISSING_FIELD',
            message: 'missing key/title'
        };
    }

    // Blank prerequisite tokens mean "no prerequisite here"
    const prerequisiteKeys = tokens
        .slice(2)
        .map(normalizeCourseKey)
        .filter((prereq) => prereq !== "");

    return { ok: true, candidate: { key, title, prerequisiteKeys } };
}
