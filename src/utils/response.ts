import type {
    EvaluateResponse,
    EvaluationResult,
    MinimalEvaluateResponse,
    StandardEvaluateResponse,
    Verbosity,
} from '../types/index.js';

/**
 * Shape an evaluation result for the requested verbosity.
 *
 * minimal:  success and verdict
 * standard: adds the verdict line, and the trace if one was recorded
 * detailed: adds statistics and the saturated relations
 */
export function buildEvaluateResponse(
    result: EvaluationResult,
    verbosity: Verbosity
): EvaluateResponse {
    const base: MinimalEvaluateResponse = {
        success: result.verdict !== 'none',
        verdict: result.verdict,
    };

    if (verbosity === 'minimal') {
        return base;
    }

    const standard: StandardEvaluateResponse = {
        ...base,
        message: result.message,
        ...(result.trace && { trace: result.trace }),
    };

    if (verbosity === 'standard') {
        return standard;
    }

    return {
        ...standard,
        statistics: result.statistics,
        relations: result.relations,
    };
}
