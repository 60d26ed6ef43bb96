// Normalized course identifier (trimmed, uppercased), e.g. "CS200"
export type CourseKey = string;

export interface CourseRecord {
    key: CourseKey;
    title: string;
    prerequisiteKeys: CourseKey[]; // Ordered, duplicates kept
}

// Keyed collection produced by one load, never mutated afterwards
export type Catalog = ReadonlyMap<CourseKey, CourseRecord>;

// VALIDATION

export type RejectReason = 'MALFORMED_LINE' | 'MISSING_FIELD';

export interface CourseCandidate {
    key: CourseKey;
    title: string;
    prerequisiteKeys: CourseKey[];
}

export type ValidationResult =
    | { ok: true; candidate: CourseCandidate }
    | { ok: false; reason: RejectReason; message: string };

// LOADING

export type DiagnosticType =
    | RejectReason
    | 'DUPLICATE_KEY'
    | 'INVALID_PREREQUISITE'
    | 'SOURCE_UNREADABLE';

export interface LoadDiagnostic {
    type: DiagnosticType;
    message: string;
    lineNumber?: number; // 1-based line in the source
    courseKey?: CourseKey;
}

export type LoadStatus = 'loaded' | 'unreadable';

export interface LoadResult {
    status: LoadStatus;
    catalog: Catalog;
    diagnostics: LoadDiagnostic[];
}

export interface LoadOptions {
    delimiter?: string;
}

// QUERIES

export interface CourseSummary {
    key: CourseKey;
    title: string;
}

export type ResolvedPrerequisite =
    | { key: CourseKey; title: string; resolved: true }
    | { key: CourseKey; resolved: false }; // Title unavailable

export type LookupResult =
    | { found: true; course: CourseSummary; prerequisites: ResolvedPrerequisite[] }
    | { found: false; key: CourseKey };
