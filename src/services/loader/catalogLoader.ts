import type {
    CourseKey,
    LoadOptions,
    LoadResult
} from "../../types/catalog-types";

import { DEFAULT_DELIMITER, tokenize } from "../tokenizer";
import { validateTokens } from "../validator/recordValidator";
import { LoadContextService } from "../loadContext";

interface ScannedLine {
    lineNumber: number;
    tokens: string[];
}

// Walk every non-blank line and yield its tokens with a 1-based line number.
function* scanLines(
    lines: readonly string[],
    delimiter: string
): Generator<ScannedLine> {
    for (let i = 0; i < lines.length; i++) {
        const tokens = tokenize(lines[i], delimiter);
        if (tokens.length === 0) continue; // skip empty lines
        yield { lineNumber: i + 1, tokens };
    }
}

/**
 * Build a catalog from the full set of input lines.
 * 1. Pass 1 collects the set of valid, unique course keys
 * 2. Pass 2 checks prerequisites against that set and inserts accepted courses
 * 3. Courses depending on a declared-but-rejected course are pruned
 * Bad rows are reported as diagnostics; nothing aborts the load.
 */
export function loadCatalog(
    lines: readonly string[],
    options: LoadOptions = {}
): LoadResult {
    const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    const context = new LoadContextService();

    collectCourseKeys(lines, delimiter, context);
    materializeCourses(lines, delimiter, context);
    pruneUnresolvedCourses(context);

    return {
        status: 'loaded',
        catalog: context.getCatalog(),
        diagnostics: context.getDiagnostics()
    };
}

// Pass 1: collect valid course keys, reporting repeats
function collectCourseKeys(
    lines: readonly string[],
    delimiter: string,
    context: LoadContextService
): void {
    for (const { lineNumber, tokens } of scanLines(lines, delimiter)) {
        const result = validateTokens(tokens);
        if (!result.ok) {
            context.addDiagnostic({
                type: result.reason,
                message: `Line ${lineNumber}: ${result.message} (skipping line)`,
                lineNumber
            });
            continue;
        }

        const { key } = result.candidate;
        if (!context.registerKey(key)) {
            context.addDiagnostic({
                type: 'DUPLICATE_KEY',
                message: `Line ${lineNumber}: duplicate course number '${key}' (skipping line)`,
                lineNumber,
                courseKey: key
            });
        }
    }
}

// Pass 2: validate prerequisites and insert valid courses
function materializeCourses(
    lines: readonly string[],
    delimiter: string,
    context: LoadContextService
): void {
    for (const { lineNumber, tokens } of scanLines(lines, delimiter)) {
        // Format errors were already reported in pass 1
        const result = validateTokens(tokens);
        if (!result.ok) continue;

        const { key, title, prerequisiteKeys } = result.candidate;
        const invalid = prerequisiteKeys.find((prereq) => !context.isDeclared(prereq));
        if (invalid !== undefined) {
            context.addDiagnostic({
                type: 'INVALID_PREREQUISITE',
                message: `Line ${lineNumber}: invalid prerequisite '${invalid}' for course '${key}' (skipping course)`,
                lineNumber,
                courseKey: key
            });
            continue;
        }

        // First occurrence that passes wins; later duplicates were reported in pass 1
        context.addCourse({ key, title, prerequisiteKeys }, lineNumber);
    }
}

// Drop courses whose prerequisite was declared but never made it into the
// catalog, repeating until every remaining reference resolves.
function pruneUnresolvedCourses(context: LoadContextService): void {
    let pruned = true;
    while (pruned) {
        pruned = false;
        for (const course of context.getAllCourses()) {
            const missing = course.prerequisiteKeys.find(
                (prereq: CourseKey) => !context.hasCourse(prereq)
            );
            if (missing === undefined) continue;

            context.removeCourse(course.key);
            const lineNumber = context.getCourseLine(course.key);
            context.addDiagnostic({
                type: 'INVALID_PREREQUISITE',
                message: `Line ${lineNumber}: prerequisite '${missing}' for course '${course.key}' was rejected (skipping course)`,
                lineNumber,
                courseKey: course.key
            });
            pruned = true;
        }
    }
}
