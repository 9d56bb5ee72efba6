#!/usr/bin/env node
/**
 * Checkpoints CLI
 *
 * List recent runs, or the checkpoint history of one run.
 *
 * Usage: npm run checkpoints -- [--run-id id] [--backend file|postgres]
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config, { CheckpointBackend } from '../config';
import { closePool } from '../db';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { createCheckpointStore, PipelineCheckpoint } from '../storage/checkpoints';

const logger = createLogger('checkpoints');

const BACKENDS: readonly CheckpointBackend[] = ['file', 'postgres', 'memory'];

export function describeCheckpoint(checkpoint: PipelineCheckpoint): string {
    const payload = checkpoint.statePayload;
    const detail = payload.error
        ? `error: ${payload.error.message}`
        : payload.kind === 'node' ? `next: ${payload.next ?? '(end)'}` : 'sub-task output stored';
    return [
        String(checkpoint.seq).padStart(4),
        checkpoint.status.padEnd(8),
        checkpoint.nodeName.padEnd(28),
        checkpoint.timestamp,
        detail,
    ].join('  ');
}

async function main(): Promise<void> {
    const argv = await yargs(hideBin(process.argv))
        .option('run-id', {
            alias: 'r',
            type: 'string',
            description: 'Show the checkpoint history of this run',
        })
        .option('backend', {
            alias: 'b',
            type: 'string',
            choices: BACKENDS,
            default: config.storage.checkpointBackend,
            description: 'Checkpoint store to read',
        })
        .help()
        .parse();

    const backend = BACKENDS.find(name => name === argv.backend) ?? config.storage.checkpointBackend;
    const store = createCheckpointStore(backend);

    try {
        const runId = argv['run-id'];
        if (!runId) {
            const runIds = await store.runIds();
            console.log(`\n=== Recent runs (${store.name}) ===`);
            runIds.forEach(id => console.log(`  ${id}`));
            if (runIds.length === 0) console.log('  (none)');
            console.log('');
            return;
        }

        const checkpoints = await store.list(runId);
        console.log(`\n=== Checkpoints for ${runId} (${store.name}) ===`);
        checkpoints.forEach(checkpoint => console.log(describeCheckpoint(checkpoint)));
        if (checkpoints.length === 0) console.log('  (none)');
        console.log('');
    } catch (error) {
        logger.error('Failed to read checkpoints', { error: errorMessage(error) });
        throw error;
    } finally {
        await closePool();
    }
}

if (require.main === module) {
    main()
        .then(() => process.exit(0))
        .catch(() => process.exit(1));
}
