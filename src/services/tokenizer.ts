export const DEFAULT_DELIMITER = ",";

// Split one raw line into trimmed fields. No quoting or escaping is supported.
// A trailing delimiter yields one extra empty field; a blank line yields none.
export function tokenize(line: string, delimiter: string = DEFAULT_DELIMITER): string[] {
    if (line.trim() === "") return [];
    return line.split(delimiter).map((field) => field.trim());
}
