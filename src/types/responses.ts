/**
 * Response types for trait inference
 */

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

/**
 * Which verdict line the evaluation selected
 */
export type Verdict = 'all' | 'some' | 'none';

/**
 * Plain-data view of a relation
 */
export interface RelationView {
    from: string[];
    to: string[];
}

export interface SaturationStatistics {
    timeMs: number;
    sweeps: number;
    derivations: number;
    relations: number;
}

/**
 * Outcome of one saturation run
 */
export interface SaturationResult {
    satisfied: boolean;
    sweeps: number;
    derivations: number;
    trace?: string[];
}

/**
 * Full result of an evaluation, before verbosity filtering
 */
export interface EvaluationResult {
    verdict: Verdict;
    message: string;
    statistics: SaturationStatistics;
    relations: RelationView[];
    trace?: string[];
}

/**
 * Minimal response - just success and the verdict
 */
export interface MinimalEvaluateResponse {
    success: boolean;
    verdict: Verdict;
}

/**
 * Standard response - includes the verdict line and trace when requested
 */
export interface StandardEvaluateResponse extends MinimalEvaluateResponse {
    message: string;
    trace?: string[];
}

/**
 * Detailed response - includes statistics and the saturated relations
 */
export interface DetailedEvaluateResponse extends StandardEvaluateResponse {
    statistics: SaturationStatistics;
    relations: RelationView[];
}

export type EvaluateResponse =
    | MinimalEvaluateResponse
    | StandardEvaluateResponse
    | DetailedEvaluateResponse;
