/**
 * File Checkpoint Store
 *
 * One JSON-lines file per run under the checkpoint directory. Lines are
 * appended, never rewritten.
 */

import fs from 'fs';
import path from 'path';
import config from '../../config';
import { errorMessage, StageFailure } from '../../errors';
import { createLogger } from '../../logger';
import { bySeq, CheckpointSchema, CheckpointStore, latestFor, PipelineCheckpoint } from './CheckpointStore';

const logger = createLogger('checkpoints:file');

function fileNameFor(runId: string): string {
    return `${runId.replace(/[^a-zA-Z0-9._-]/g, '_')}.jsonl`;
}

export class FileCheckpointStore implements CheckpointStore {
    readonly name = 'file';
    private pending: Promise<void> = Promise.resolve();

    constructor(private readonly directory: string = config.storage.checkpointDir) { }

    private pathFor(runId: string): string {
        return path.join(this.directory, fileNameFor(runId));
    }

    /**
     * Appends are chained so concurrent sub-task writes land as whole lines
     */
    put(checkpoint: PipelineCheckpoint): Promise<void> {
        const write = this.pending.then(async () => {
            await fs.promises.mkdir(this.directory, { recursive: true });
            await fs.promises.appendFile(this.pathFor(checkpoint.runId), `${JSON.stringify(checkpoint)}\n`, 'utf-8');
        });
        this.pending = write.catch((error: unknown) => {
            logger.error('Checkpoint write failed', { runId: checkpoint.runId, error: errorMessage(error) });
        });
        return write;
    }

    async get(runId: string, nodeName: string): Promise<PipelineCheckpoint | null> {
        return latestFor(await this.list(runId), nodeName);
    }

    async list(runId: string): Promise<PipelineCheckpoint[]> {
        let raw: string;
        try {
            raw = await fs.promises.readFile(this.pathFor(runId), 'utf-8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return [];
            }
            throw error;
        }

        const checkpoints: PipelineCheckpoint[] = [];
        raw.split('\n').forEach((line, index) => {
            if (!line.trim()) return;
            let parsed: unknown;
            try {
                parsed = JSON.parse(line);
            } catch (error) {
                // A torn final line is what an interrupted append leaves behind
                logger.warn('Skipping unreadable checkpoint line', { runId, line: index + 1, error: errorMessage(error) });
                return;
            }
            const result = CheckpointSchema.safeParse(parsed);
            if (!result.success) {
                throw new StageFailure('checkpoints', `Malformed checkpoint at ${this.pathFor(runId)}:${index + 1}`);
            }
            checkpoints.push(result.data);
        });

        return checkpoints.sort(bySeq);
    }

    /**
     * Run ids with a checkpoint file, newest first
     */
    async runIds(): Promise<string[]> {
        let entries: string[];
        try {
            entries = await fs.promises.readdir(this.directory);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return [];
            }
            throw error;
        }

        const files = entries.filter(entry => entry.endsWith('.jsonl'));
        const stats = await Promise.all(files.map(async file => ({
            runId: file.slice(0, -'.jsonl'.length),
            modified: (await fs.promises.stat(path.join(this.directory, file))).mtimeMs,
        })));
        return stats.sort((a, b) => b.modified - a.modified).map(entry => entry.runId);
    }
}

export default FileCheckpointStore;
