import {
    DEFAULTS,
    EvaluateOptions,
    EvaluateResponse,
    EvaluationResult,
} from '../types/index.js';
import {
    CheckWellFormedHandlerArgsSchema,
    EvaluateHandlerArgs,
    EvaluateHandlerArgsSchema,
    EvaluateTextHandlerArgsSchema,
} from '../types/handlers.js';
import { Reasoner } from '../reasoner.js';
import { validateStatements, ValidationReport } from '../validation/syntax.js';
import { buildEvaluateResponse } from '../utils/response.js';
import { parseArgs } from './utils.js';

type ProgressCallback = (progress: number, message: string) => void;

function evaluateOptions(
    args: Omit<EvaluateHandlerArgs, 'statements'>,
    onProgress?: ProgressCallback
): EvaluateOptions {
    return {
        query: { subject: args.subject, ability: args.ability },
        includeTrace: args.include_trace,
        onProgress,
    };
}

export function evaluateHandler(
    rawArgs: unknown,
    reasoner: Reasoner,
    onProgress?: ProgressCallback
): EvaluateResponse | { success: false; result: 'syntax_error'; validation: ValidationReport } {
    const args = parseArgs(EvaluateHandlerArgsSchema, rawArgs);

    // Report every bad statement at once rather than the first loader error
    const validation = validateStatements(args.statements);
    if (!validation.valid) {
        return { success: false, result: 'syntax_error', validation };
    }

    const result: EvaluationResult = reasoner.evaluateStatements(
        args.statements,
        evaluateOptions(args, onProgress)
    );
    return buildEvaluateResponse(result, args.verbosity ?? DEFAULTS.verbosity);
}

export function evaluateTextHandler(
    rawArgs: unknown,
    reasoner: Reasoner,
    onProgress?: ProgressCallback
): EvaluateResponse {
    const args = parseArgs(EvaluateTextHandlerArgsSchema, rawArgs);
    const result = reasoner.evaluateText(args.input, evaluateOptions(args, onProgress));
    return buildEvaluateResponse(result, args.verbosity ?? DEFAULTS.verbosity);
}

export function checkWellFormedHandler(rawArgs: unknown): ValidationReport {
    const { statements } = parseArgs(CheckWellFormedHandlerArgsSchema, rawArgs);
    return validateStatements(statements);
}
