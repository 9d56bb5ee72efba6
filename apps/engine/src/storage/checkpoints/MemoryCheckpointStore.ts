/**
 * In-memory checkpoint store, for tests and one-shot runs
 */

import { bySeq, CheckpointStore, latestFor, PipelineCheckpoint } from './CheckpointStore';

export class MemoryCheckpointStore implements CheckpointStore {
    readonly name = 'memory';
    private readonly runs = new Map<string, PipelineCheckpoint[]>();

    async put(checkpoint: PipelineCheckpoint): Promise<void> {
        const log = this.runs.get(checkpoint.runId) ?? [];
        log.push(structuredClone(checkpoint));
        this.runs.set(checkpoint.runId, log);
    }

    async get(runId: string, nodeName: string): Promise<PipelineCheckpoint | null> {
        const found = latestFor(this.runs.get(runId) ?? [], nodeName);
        return found ? structuredClone(found) : null;
    }

    async list(runId: string): Promise<PipelineCheckpoint[]> {
        return (this.runs.get(runId) ?? []).map(checkpoint => structuredClone(checkpoint)).sort(bySeq);
    }

    async runIds(): Promise<string[]> {
        return [...this.runs.keys()].reverse();
    }
}

export default MemoryCheckpointStore;
