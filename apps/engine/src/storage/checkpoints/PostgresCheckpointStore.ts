/**
 * PostgreSQL Checkpoint Store
 *
 * Rows in pipeline_checkpoints (see migrations/001_pipeline_checkpoints.sql).
 * The payload is stored as JSONB and re-validated on read.
 */

import { QueryResultRow } from 'pg';
import { z } from 'zod';
import { query as poolQuery } from '../../db';
import { StageFailure } from '../../errors';
import { CheckpointSchema, CheckpointStore, PipelineCheckpoint } from './CheckpointStore';

export type QueryFn = (text: string, params?: unknown[]) => Promise<{ rows: QueryResultRow[] }>;

const CheckpointRowSchema = z.object({
    runId: z.string(),
    nodeName: z.string(),
    seq: z.coerce.number(),
    status: z.string(),
    statePayload: z.unknown(),
    timestamp: z.union([z.date().transform(date => date.toISOString()), z.string()]),
});

const SELECT_COLUMNS = `run_id as "runId", node_name as "nodeName", seq, status,
     state_payload as "statePayload", created_at as "timestamp"`;

function toCheckpoint(row: QueryResultRow): PipelineCheckpoint {
    const parsedRow = CheckpointRowSchema.safeParse(row);
    const result = parsedRow.success ? CheckpointSchema.safeParse(parsedRow.data) : parsedRow;
    if (!result.success) {
        throw new StageFailure('checkpoints', 'Malformed checkpoint row', result.error);
    }
    return result.data;
}

export class PostgresCheckpointStore implements CheckpointStore {
    readonly name = 'postgres';

    constructor(private readonly query: QueryFn = poolQuery) { }

    async put(checkpoint: PipelineCheckpoint): Promise<void> {
        await this.query(
            `INSERT INTO pipeline_checkpoints (run_id, node_name, seq, status, state_payload, created_at)
     VALUES ($1, $2, $3, $4, $5, $6)`,
            [
                checkpoint.runId,
                checkpoint.nodeName,
                checkpoint.seq,
                checkpoint.status,
                JSON.stringify(checkpoint.statePayload),
                checkpoint.timestamp,
            ]
        );
    }

    async get(runId: string, nodeName: string): Promise<PipelineCheckpoint | null> {
        const result = await this.query(
            `SELECT ${SELECT_COLUMNS}
     FROM pipeline_checkpoints
     WHERE run_id = $1 AND node_name = $2
     ORDER BY seq DESC
     LIMIT 1`,
            [runId, nodeName]
        );
        return result.rows.length > 0 ? toCheckpoint(result.rows[0]) : null;
    }

    async list(runId: string): Promise<PipelineCheckpoint[]> {
        const result = await this.query(
            `SELECT ${SELECT_COLUMNS}
     FROM pipeline_checkpoints
     WHERE run_id = $1
     ORDER BY seq ASC`,
            [runId]
        );
        return result.rows.map(toCheckpoint);
    }

    async runIds(limit = 20): Promise<string[]> {
        const result = await this.query(
            `SELECT run_id as "runId"
     FROM pipeline_checkpoints
     GROUP BY run_id
     ORDER BY MAX(created_at) DESC
     LIMIT $1`,
            [limit]
        );
        return result.rows.map(row => String(row.runId));
    }
}

export default PostgresCheckpointStore;
