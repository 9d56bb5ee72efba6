/**
 * Artifact Store
 *
 * Where accepted scripts go. Saving the same run twice overwrites the
 * earlier copy, so a retried accept node leaves one artifact.
 */

import fs from 'fs';
import path from 'path';
import slugify from 'slugify';
import config from '../../config';
import { createLogger } from '../../logger';
import { ArtifactRecord, ScriptArtifact } from '../../pipeline/types';

const logger = createLogger('artifacts');

export interface ArtifactStore {
    /**
     * Store name for logging
     */
    readonly name: string;

    save(artifact: ScriptArtifact): Promise<ArtifactRecord>;
}

/**
 * File name stem for an artifact
 */
export function generateSlug(text: string): string {
    return slugify(text, {
        lower: true,
        strict: true,
        trim: true,
    }).slice(0, 120);
}

export class FileArtifactStore implements ArtifactStore {
    readonly name = 'file';

    constructor(
        private readonly directory: string = config.storage.artifactDir,
        private readonly clock: () => Date = () => new Date()
    ) { }

    async save(artifact: ScriptArtifact): Promise<ArtifactRecord> {
        await fs.promises.mkdir(this.directory, { recursive: true });

        const location = path.join(this.directory, `${generateSlug(`${artifact.runId} ${artifact.draft.title}`)}.json`);
        await fs.promises.writeFile(location, `${JSON.stringify(artifact, null, 2)}\n`, 'utf-8');

        logger.info('Script artifact saved', {
            runId: artifact.runId,
            location,
            wordCount: artifact.draft.wordCount,
        });

        return { runId: artifact.runId, location, savedAt: this.clock().toISOString() };
    }
}

export class MemoryArtifactStore implements ArtifactStore {
    readonly name = 'memory';
    readonly saved = new Map<string, ScriptArtifact>();

    constructor(private readonly clock: () => Date = () => new Date()) { }

    async save(artifact: ScriptArtifact): Promise<ArtifactRecord> {
        this.saved.set(artifact.runId, structuredClone(artifact));
        return { runId: artifact.runId, location: `memory://${artifact.runId}`, savedAt: this.clock().toISOString() };
    }
}

export default FileArtifactStore;
