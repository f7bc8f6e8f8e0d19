#!/usr/bin/env node
/**
 * Trait Inference - MCP Entry Point
 *
 * Starts the MCP server on stdio.
 */

import { runServer } from './server.js';
import { VERSION } from './version.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
Trait Inference Server - all/some/none verdicts over trait statements

Usage: trait-infer-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - evaluate           Evaluate a list of statements
  - evaluate-text      Evaluate counted statement text
  - check-well-formed  Validate statement grammar

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`trait-infer-mcp version ${VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
});
