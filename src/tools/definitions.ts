import type { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (verdict only), 'standard' (default, adds the verdict line), 'detailed' (statistics and saturated relations)",
};

const queryProperties = {
    subject: {
        type: 'string',
        description: "Subject label of the query (default: 'PIGS').",
    },
    ability: {
        type: 'string',
        description: "Ability label of the query (default: 'FLY').",
    },
    include_trace: {
        type: 'boolean',
        description: 'Include every merge and cascade step in the output. Default: false.',
    },
    verbosity: verbositySchema,
};

export const TOOLS: Tool[] = [
    {
        name: 'evaluate',
        description: `Decide whether all, some or no subjects have the ability, given trait statements.

**When to use:** You have statements like "PIGS have WINGS" and want the strongest claim that follows.

**Example:**
  statements: ["PIGS have WINGS", "things with WINGS can FLY"]
  → Returns: { success: true, verdict: "all", message: "All pigs can fly" }

**Grammar:**
- premise and conclusion are separated by exactly one of 'are', 'have', 'can'
- labels within a side are joined by 'with', 'and' or 'that can'
- a premise starting with 'things' applies to anything with the following labels`,
        inputSchema: {
            type: 'object',
            properties: {
                statements: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Trait statements, one relation each',
                },
                ...queryProperties,
            },
            required: ['statements'],
        },
    },
    {
        name: 'evaluate-text',
        description: `Same as evaluate, but takes the counted text format: a first line with the number of statements, then one statement per line.

**Example:**
  input: "1\\nCATS have CLAWS"
  → Returns: { success: false, verdict: "none", message: "No pigs can fly" }`,
        inputSchema: {
            type: 'object',
            properties: {
                input: {
                    type: 'string',
                    description: 'Counted statement text',
                },
                ...queryProperties,
            },
            required: ['input'],
        },
    },
    {
        name: 'check-well-formed',
        description: `Check trait statements against the grammar without evaluating them.

**Example:**
  statements: ["PIGS that FLY"]
  → Returns: { valid: false, statementResults: [...] }`,
        inputSchema: {
            type: 'object',
            properties: {
                statements: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Trait statements to check',
                },
            },
            required: ['statements'],
        },
    },
];
