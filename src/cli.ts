#!/usr/bin/env node
import { readFileSync } from 'fs';
import chalk from 'chalk';
import { loadRelations, readStatements } from './parser/index.js';
import { createReasoner } from './reasoner.js';
import { validateStatements } from './validation/syntax.js';
import { DEFAULTS, InferenceException } from './types/index.js';
import { VERSION } from './version.js';
import { parseCliArgs } from './cliArgs.js';

const HELP = `
Trait Inference CLI v${VERSION}

Usage:
  trait-infer [check] [file]     Evaluate counted statements (reads stdin without a file)
  trait-infer validate [file]    Check statement grammar without evaluating

Input:
  First line: number of statements. Then one statement per line, e.g.
    2
    PIGS have WINGS
    things with WINGS can FLY

Options:
  --subject=<LABEL>  Subject label of the query (default: ${DEFAULTS.subject})
  --ability=<LABEL>  Ability label of the query (default: ${DEFAULTS.ability})
  --trace            Print merge and cascade steps after the verdict
  --verbose          Print load and evaluation timings to stderr
  --help, -h         Show this help
  --version, -v      Show version
`;

function readInput(fileName?: string): string {
    // fd 0 is stdin
    return readFileSync(fileName ?? 0, 'utf-8');
}

function main(): void {
    const { command, fileName, subject, ability, trace, verbose, help, version } =
        parseCliArgs(process.argv.slice(2));

    if (help) {
        console.log(HELP);
        return;
    }

    if (version) {
        console.log(VERSION);
        return;
    }

    const input = readInput(fileName);

    switch (command) {
        case 'check': {
            const start = Date.now();
            const relations = loadRelations(input);
            if (verbose) console.error(`Loaded ${relations.length} relations in ${Date.now() - start}ms`);

            const result = createReasoner().evaluate(relations, {
                query: { subject, ability },
                includeTrace: trace,
            });

            console.log(result.message);
            if (result.trace) {
                console.log('\nTrace:\n' + result.trace.join('\n'));
            }
            if (verbose) {
                const { sweeps, derivations, timeMs } = result.statistics;
                console.error(`Evaluated in ${timeMs}ms (${sweeps} sweeps, ${derivations} derivations)`);
            }
            break;
        }
        case 'validate': {
            const report = validateStatements(readStatements(input));
            for (const r of report.statementResults) {
                if (r.valid) {
                    console.log(chalk.green(`✓ ${r.statement}`));
                } else {
                    console.log(chalk.red(`✗ ${r.statement}`));
                    r.errors.forEach(e => console.log(`  Error: ${e}`));
                }
                r.warnings.forEach(w => console.log(chalk.yellow(`  Warning: ${w}`)));
            }
            process.exitCode = report.valid ? 0 : 1;
            break;
        }
    }
}

try {
    main();
} catch (e) {
    if (e instanceof InferenceException) {
        console.error(chalk.red(`Error [${e.error.code}]: ${e.message}`));
        if (e.error.details?.statement !== undefined) {
            console.error(`  In statement ${e.error.details.statement}: ${e.error.context ?? ''}`);
        }
        const issues = e.error.details?.issues;
        if (Array.isArray(issues)) {
            issues.forEach(issue => console.error(`  ${String(issue)}`));
        }
        if (e.error.suggestion) {
            console.error(`  Suggestion: ${e.error.suggestion}`);
        }
    } else {
        console.error(chalk.red('Error:'), e instanceof Error ? e.message : String(e));
    }
    process.exit(1);
}
