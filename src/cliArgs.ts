import { createInvalidArgumentsError } from './types/index.js';

export const COMMANDS = ['check', 'validate'] as const;
export type CommandName = typeof COMMANDS[number];

export interface CliArgs {
    command: CommandName;
    fileName?: string;
    subject?: string;
    ability?: string;
    trace: boolean;
    verbose: boolean;
    help: boolean;
    version: boolean;
}

function isCommand(word: string | undefined): word is CommandName {
    return COMMANDS.some(c => c === word);
}

/**
 * Parse CLI arguments (without the node and script entries).
 * Throws INVALID_ARGUMENTS when a query label is given empty.
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
    let subject: string | undefined;
    let ability: string | undefined;
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('--subject=')) {
            subject = arg.slice('--subject='.length);
        } else if (arg.startsWith('--ability=')) {
            ability = arg.slice('--ability='.length);
        } else if (arg === '--subject' || arg === '--ability') {
            const value = args[i + 1] ?? '';
            if (arg === '--subject') subject = value;
            else ability = value;
            i++;
        } else if (!arg.startsWith('-')) {
            positional.push(arg);
        }
    }

    const issues: string[] = [];
    if (subject === '') issues.push('--subject: label must not be empty');
    if (ability === '') issues.push('--ability: label must not be empty');
    if (issues.length > 0) {
        throw createInvalidArgumentsError('Invalid command-line arguments', issues);
    }

    const [first, second] = positional;
    const command = isCommand(first) ? first : 'check';

    return {
        command,
        fileName: isCommand(first) ? second : first,
        subject,
        ability,
        trace: args.includes('--trace'),
        verbose: args.includes('--verbose'),
        help: args.includes('--help') || args.includes('-h'),
        version: args.includes('--version') || args.includes('-v'),
    };
}
