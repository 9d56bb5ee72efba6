/**
 * Checkpoint Store Interface
 *
 * Append-only log of node completions per run. The engine is the only
 * writer; each fan-out sub-task writes under its own "node/key" name.
 */

import { z } from 'zod';

export const CHECKPOINT_STATUSES = ['ok', 'failed', 'retrying'] as const;
export type CheckpointStatus = typeof CHECKPOINT_STATUSES[number];

const SerializedErrorSchema = z.object({
    name: z.string(),
    code: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
});

/**
 * Node checkpoints carry the state after the node and the node to run next;
 * sub-task checkpoints carry the sub-task's output
 */
export const CheckpointPayloadSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('node'),
        state: z.unknown(),
        next: z.string().nullable(),
        error: SerializedErrorSchema.optional(),
    }),
    z.object({
        kind: z.literal('subtask'),
        output: z.unknown(),
        error: SerializedErrorSchema.optional(),
    }),
]);

export const CheckpointSchema = z.object({
    runId: z.string().min(1),
    nodeName: z.string().min(1),
    seq: z.number().int().min(0),
    statePayload: CheckpointPayloadSchema,
    timestamp: z.string(),
    status: z.enum(CHECKPOINT_STATUSES),
});

export type CheckpointPayload = z.infer<typeof CheckpointPayloadSchema>;
export type PipelineCheckpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointStore {
    readonly name: string;

    /**
     * Durably append a checkpoint
     */
    put(checkpoint: PipelineCheckpoint): Promise<void>;

    /**
     * Latest checkpoint written for a node, or null
     */
    get(runId: string, nodeName: string): Promise<PipelineCheckpoint | null>;

    /**
     * All checkpoints of a run in write order
     */
    list(runId: string): Promise<PipelineCheckpoint[]>;

    /**
     * Runs with at least one checkpoint, most recent first
     */
    runIds(): Promise<string[]>;
}

export function latestFor(checkpoints: PipelineCheckpoint[], nodeName: string): PipelineCheckpoint | null {
    let latest: PipelineCheckpoint | null = null;
    for (const checkpoint of checkpoints) {
        if (checkpoint.nodeName !== nodeName) continue;
        if (!latest || checkpoint.seq >= latest.seq) latest = checkpoint;
    }
    return latest;
}

export function bySeq(a: PipelineCheckpoint, b: PipelineCheckpoint): number {
    return a.seq - b.seq;
}
