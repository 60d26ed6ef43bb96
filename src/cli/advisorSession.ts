import { CatalogSession } from "../services/catalogSession";
import { listSorted, lookup } from "../services/query";

export type Prompt = (question: string) => Promise<string>;

export const MENU = [
    "",
    "Menu:",
    "  1. Load Data Structure",
    "  2. Print Course List",
    "  3. Print Course",
    "  9. Exit",
].join("\n");

const NOT_LOADED = "Please load data first (Option 1).";

/**
 * Menu-driven advising session. Each choice returns the lines to print,
 * so the loop in scripts/advisor.ts only deals with the terminal.
 */
export class AdvisorSession {
    private finished = false;

    constructor(
        private readonly catalog: CatalogSession,
        private readonly prompt: Prompt
    ) {}

    isFinished(): boolean {
        return this.finished;
    }

    async handleChoice(rawChoice: string): Promise<string[]> {
        const input = rawChoice.trim();
        if (!/^[+-]?\d+$/.test(input)) {
            return ["Invalid input. Please enter 1, 2, 3, or 9."];
        }

        switch (Number(input)) {
            case 1:
                return this.load();
            case 2:
                return this.printCourseList();
            case 3:
                return this.printCourse();
            case 9:
                this.finished = true;
                return ["Goodbye."];
            default:
                return ["Invalid option. Please enter 1, 2, 3, or 9."];
        }
    }

    private async load(): Promise<string[]> {
        let fileName = this.catalog.getFilePath().trim();
        if (!fileName) {
            fileName = (await this.prompt("Enter the course data file name: ")).trim();
        }

        const result = await this.catalog.reload(fileName);
        if (result.catalog.size === 0) {
            return ["No courses loaded. Check errors above and try again."];
        }
        return [`Data loaded successfully (${result.catalog.size} courses).`];
    }

    private printCourseList(): string[] {
        if (!this.catalog.hasData()) return [NOT_LOADED];
        return listSorted(this.catalog.getCatalog()).map(
            (course) => `${course.key}, ${course.title}`
        );
    }

    private async printCourse(): Promise<string[]> {
        if (!this.catalog.hasData()) return [NOT_LOADED];

        const rawKey = await this.prompt("Enter a course number (e.g., CS200): ");
        const result = lookup(this.catalog.getCatalog(), rawKey);
        if (!result.found) return [`Course not found: ${result.key}`];

        const lines = [`${result.course.key}, ${result.course.title}`];
        if (result.prerequisites.length === 0) {
            lines.push("Prerequisites: None");
            return lines;
        }

        lines.push("Prerequisites:");
        for (const prereq of result.prerequisites) {
            lines.push(prereq.resolved
                ? `  ${prereq.key}, ${prereq.title}`
                : `  ${prereq.key} (missing info)`);
        }
        return lines;
    }
}
