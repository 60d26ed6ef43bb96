// Run this script to browse a course data file from the terminal
// Usage:
// ts-node scripts/advisor.ts

import * as readline from 'node:readline/promises';
import { config } from '../src/config/env';
import { CatalogSession } from '../src/services/catalogSession';
import { AdvisorSession, MENU } from '../src/cli/advisorSession';

async function runAdvisor() {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout
    });

    try {
        console.log('Welcome to the Course Advising Program');

        // Prompt for the filename up front; an empty answer is asked again on load
        const fileName = (await rl.question('Enter the course data file name: ')).trim();
        const catalog = new CatalogSession(fileName, { delimiter: config.catalogDelimiter });
        const session = new AdvisorSession(catalog, (question) => rl.question(question));

        while (!session.isFinished()) {
            console.log(MENU);
            const choice = await rl.question('Enter your choice: ');
            for (const line of await session.handleChoice(choice)) {
                console.log(line);
            }
        }
    } finally {
        rl.close();
    }
}

async function main() {
    try {
        await runAdvisor();
    } catch (error) {
        console.error('Advisor failed:', error);
        process.exit(1);
    }
}

void main();
