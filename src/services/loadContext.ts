import type {
    Catalog,
    CourseKey,
    CourseRecord,
    LoadDiagnostic
} from "../types/catalog-types";

interface LoadContext {
    declaredKeys: Set<CourseKey>;
    courses: Map<CourseKey, CourseRecord>;
    courseLines: Map<CourseKey, number>; // key -> line the accepted course came from
    diagnostics: LoadDiagnostic[];
}

/**
 * LoadContextService class for managing state across the passes of one load.
 * A fresh instance is created per load, so nothing leaks between loads.
 */
export class LoadContextService {
    private context: LoadContext;

    constructor() {
        this.context = {
            declaredKeys: new Set(),
            courses: new Map(),
            courseLines: new Map(),
            diagnostics: []
        };
    }

    // KEY SET MANAGEMENT

    /**
     * Register a declared key. Returns false if it was already registered.
     */
    registerKey(key: CourseKey): boolean {
        if (this.context.declaredKeys.has(key)) return false;
        this.context.declaredKeys.add(key);
        return true;
    }

    isDeclared(key: CourseKey): boolean {
        return this.context.declaredKeys.has(key);
    }

    // COURSE MANAGEMENT

    /**
     * Insert a course unless its key is already present
     */
    addCourse(course: CourseRecord, lineNumber: number): boolean {
        if (this.context.courses.has(course.key)) return false;
        this.context.courses.set(course.key, course);
        this.context.courseLines.set(course.key, lineNumber);
        return true;
    }

    /**
     * Line number an accepted course was read from
     */
    getCourseLine(key: CourseKey): number | undefined {
        return this.context.courseLines.get(key);
    }

    hasCourse(key: CourseKey): boolean {
        return this.context.courses.has(key);
    }

    removeCourse(key: CourseKey): void {
        this.context.courses.delete(key);
        this.context.courseLines.delete(key);
    }

    getAllCourses(): CourseRecord[] {
        return Array.from(this.context.courses.values());
    }

    getCatalog(): Catalog {
        return new Map(this.context.courses);
    }

    // DIAGNOSTIC MANAGEMENT

    addDiagnostic(diagnostic: LoadDiagnostic): void {
        this.context.diagnostics.push(diagnostic);
    }

    getDiagnostics(): LoadDiagnostic[] {
        return [...this.context.diagnostics];
    }
}
