/**
 * Pipeline Errors
 *
 * Typed failures raised by adapters, generation calls and the stage graph.
 * A failed structure validation is not an error: it is a report with
 * severity 'fail'.
 */

export type PipelineErrorCode =
    | 'FETCH_TIMEOUT'
    | 'FETCH_ERROR'
    | 'ALL_SOURCES_FAILED'
    | 'GENERATION_TIMEOUT'
    | 'GENERATION_ERROR'
    | 'STAGE_FAILURE'
    | 'CONFIG_ERROR'
    | 'RUN_CANCELLED';

export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly code: PipelineErrorCode,
        public readonly details: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'PipelineError';
    }
}

export class FetchTimeout extends PipelineError {
    constructor(source: string, timeoutMs: number) {
        super(`Source "${source}" timed out after ${timeoutMs}ms`, 'FETCH_TIMEOUT', { source, timeoutMs });
        this.name = 'FetchTimeout';
    }
}

export class FetchError extends PipelineError {
    constructor(source: string, message: string, status?: number) {
        super(`Source "${source}" failed: ${message}`, 'FETCH_ERROR', { source, status });
        this.name = 'FetchError';
    }
}

export class AllSourcesFailed extends PipelineError {
    constructor(failures: Array<{ source: string; kind: string; message: string }>) {
        super(`All ${failures.length} sources failed`, 'ALL_SOURCES_FAILED', { failures });
        this.name = 'AllSourcesFailed';
    }
}

export class GenerationTimeout extends PipelineError {
    constructor(timeoutMs: number) {
        super(`Generation timed out after ${timeoutMs}ms`, 'GENERATION_TIMEOUT', { timeoutMs });
        this.name = 'GenerationTimeout';
    }
}

export class GenerationError extends PipelineError {
    constructor(message: string, provider?: string) {
        super(message, 'GENERATION_ERROR', { provider });
        this.name = 'GenerationError';
    }
}

export class StageFailure extends PipelineError {
    constructor(
        public readonly stage: string,
        message: string,
        public readonly underlying?: unknown
    ) {
        super(`Stage "${stage}" failed: ${message}`, 'STAGE_FAILURE', { stage });
        this.name = 'StageFailure';
    }
}

export class ConfigError extends PipelineError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, 'CONFIG_ERROR', { issues });
        this.name = 'ConfigError';
    }
}

export class RunCancelled extends PipelineError {
    constructor(runId: string, node: string | null) {
        super(`Run ${runId} cancelled${node ? ` during "${node}"` : ''}`, 'RUN_CANCELLED', { runId, node });
        this.name = 'RunCancelled';
    }
}

export interface SerializedError {
    name: string;
    code: PipelineErrorCode | 'UNKNOWN';
    message: string;
    details?: Record<string, unknown>;
}

/**
 * Convert any thrown value into a checkpoint-safe record
 */
export function serializeError(error: unknown): SerializedError {
    if (error instanceof PipelineError) {
        return { name: error.name, code: error.code, message: error.message, details: error.details };
    }
    if (error instanceof Error) {
        return { name: error.name, code: 'UNKNOWN', message: error.message };
    }
    return { name: 'Error', code: 'UNKNOWN', message: String(error) };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
