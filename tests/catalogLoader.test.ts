import { loadCatalog } from '../src/services/loader/catalogLoader';

const SAMPLE = [
    'CS101, Intro to CS,',
    'CS201, Data Structures, CS101',
    'CS300, Algorithms, CS201,CS999',
    'cs101, Duplicate Intro,',
];

describe('loadCatalog', () => {
    it('loads the sample catalog and reports rejected rows', () => {
        const result = loadCatalog(SAMPLE);

        expect(result.status).toBe('loaded');
        expect(Array.from(result.catalog.keys())).toEqual(['CS101', 'CS201']);
        expect(result.catalog.get('CS101')).toEqual({
            key: 'CS101',
            title: 'Intro to CS',
            prerequisiteKeys: []
        });
        expect(result.catalog.get('CS201')?.prerequisiteKeys).toEqual(['CS101']);
        expect(result.diagnostics).toEqual([
            {
                type: 'DUPLICATE_KEY',
                message: "Line 4: duplicate course number 'CS101' (skipping line)",
                lineNumber: 4,
                courseKey: 'CS101'
            },
            {
                type: 'INVALID_PREREQUISITE',
                message: "Line 3: invalid prerequisite 'CS999' for course 'CS300' (skipping course)",
                lineNumber: 3,
                courseKey: 'CS300'
            },
        ]);
    });

    it('keeps the first declaration of a duplicated key', () => {
        const result = loadCatalog(['cs101, Intro to CS', 'CS101 , Another Title']);
        expect(result.catalog.size).toBe(1);
        expect(result.catalog.get('CS101')?.title).toBe('Intro to CS');
    });

    it('accepts a later duplicate when the first declaration is rejected', () => {
        const result = loadCatalog(['X1, First, NOPE', 'x1, Second']);
        expect(result.catalog.get('X1')).toEqual({
            key: 'X1',
            title: 'Second',
            prerequisiteKeys: []
        });
        expect(result.diagnostics.map((d) => d.type)).toEqual(['DUPLICATE_KEY', 'INVALID_PREREQUISITE']);
    });

    it('reports pruned courses on the line they were read from', () => {
        const result = loadCatalog(['X1, First, NOPE', 'X2, Needs, Q', 'x1, Second, X2', 'Q, Queue, ZZ']);
        expect(result.catalog.size).toBe(0);
        expect(result.diagnostics.map((d) => d.message)).toEqual([
            "Line 3: duplicate course number 'X1' (skipping line)",
            "Line 1: invalid prerequisite 'NOPE' for course 'X1' (skipping course)",
            "Line 4: invalid prerequisite 'ZZ' for course 'Q' (skipping course)",
            "Line 2: prerequisite 'Q' for course 'X2' was rejected (skipping course)",
            "Line 3: prerequisite 'X2' for course 'X1' was rejected (skipping course)",
        ]);
    });

    it('accepts prerequisites declared later in the file', () => {
        const result = loadCatalog(['B, Beta, a', 'A, Alpha']);
        expect(result.catalog.get('B')?.prerequisiteKeys).toEqual(['A']);
        expect(result.diagnostics).toEqual([]);
    });

    it('reports format errors once and skips blank lines', () => {
        const result = loadCatalog(['', 'JUSTKEY', '  ,Title', 'K1,   ', '   ', 'K2, Good']);
        expect(Array.from(result.catalog.keys())).toEqual(['K2']);
        expect(result.diagnostics).toEqual([
            {
                type: 'MALFORMED_LINE',
                message: 'Line 2: malformed: missing key or title (skipping line)',
                lineNumber: 2
            },
            {
                type: 'MISSING_FIELD',
                message: 'Line 3: missing key/title (skipping line)',
                lineNumber: 3
            },
            {
                type: 'MISSING_FIELD',
                message: 'Line 4: missing key/title (skipping line)',
                lineNumber: 4
            },
        ]);
    });

    it('drops courses that depend on a rejected course', () => {
        const result = loadCatalog(['A, Alpha, Z', 'B, Beta, A', 'C, Gamma, B', 'D, Delta']);
        expect(Array.from(result.catalog.keys())).toEqual(['D']);
        expect(result.diagnostics.map((d) => d.message)).toEqual([
            "Line 1: invalid prerequisite 'Z' for course 'A' (skipping course)",
            "Line 2: prerequisite 'A' for course 'B' was rejected (skipping course)",
            "Line 3: prerequisite 'B' for course 'C' was rejected (skipping course)",
        ]);
    });

    it('leaves every prerequisite resolvable in the final catalog', () => {
        const result = loadCatalog([...SAMPLE, 'CS400, Capstone, CS300', 'CS250, Systems, cs201, CS101']);
        for (const course of result.catalog.values()) {
            for (const prereq of course.prerequisiteKeys) {
                expect(result.catalog.has(prereq)).toBe(true);
            }
        }
        expect(result.catalog.has('CS400')).toBe(false);
        expect(result.catalog.get('CS250')?.prerequisiteKeys).toEqual(['CS201', 'CS101']);
    });

    it('splits on a configured delimiter', () => {
        const result = loadCatalog(['A|Alpha', 'B|Beta|a'], { delimiter: '|' });
        expect(result.catalog.get('B')?.prerequisiteKeys).toEqual(['A']);
    });

    it('returns an empty catalog when nothing validates', () => {
        const result = loadCatalog(['only-one-field', '']);
        expect(result.status).toBe('loaded');
        expect(result.catalog.size).toBe(0);
        expect(result.diagnostics).toHaveLength(1);
    });

    it('gives the same catalog when loading the same input twice', () => {
        const first = loadCatalog(SAMPLE);
        const second = loadCatalog(SAMPLE);
        expect(Array.from(second.catalog.entries())).toEqual(Array.from(first.catalog.entries()));
        expect(second.catalog).not.toBe(first.catalog);
    });
});
