/**
 * Checkpoint store selection
 */

import config, { CheckpointBackend } from '../../config';
import { CheckpointStore } from './CheckpointStore';
import { FileCheckpointStore } from './FileCheckpointStore';
import { MemoryCheckpointStore } from './MemoryCheckpointStore';
import { PostgresCheckpointStore } from './PostgresCheckpointStore';

export function createCheckpointStore(backend: CheckpointBackend = config.storage.checkpointBackend): CheckpointStore {
    switch (backend) {
        case 'memory':
            return new MemoryCheckpointStore();
        case 'postgres':
            return new PostgresCheckpointStore();
        case 'file':
            return new FileCheckpointStore();
    }
}

export * from './CheckpointStore';
export { FileCheckpointStore, MemoryCheckpointStore, PostgresCheckpointStore };
