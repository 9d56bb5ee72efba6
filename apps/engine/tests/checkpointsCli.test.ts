/**
 * Tests for the checkpoints CLI output
 */

import { describeCheckpoint } from '../src/cli/checkpoints';
import { PipelineCheckpoint } from '../src/storage/checkpoints';

const TIMESTAMP = '2025-09-02T12:00:00.000Z';

describe('describeCheckpoint', () => {
    it('should show the next node of a node checkpoint', () => {
        const checkpoint: PipelineCheckpoint = {
            runId: 'run-1',
            nodeName: 'fetch_sources',
            seq: 7,
            statePayload: { kind: 'node', state: {}, next: 'normalize' },
            timestamp: TIMESTAMP,
            status: 'ok',
        };

        expect(describeCheckpoint(checkpoint))
            .toBe('   7  ok        fetch_sources                 2025-09-02T12:00:00.000Z  next: normalize');
    });

    it('should mark the end of a run', () => {
        const checkpoint: PipelineCheckpoint = {
            runId: 'run-1',
            nodeName: 'accept',
            seq: 3,
            statePayload: { kind: 'node', state: {}, next: null },
            timestamp: TIMESTAMP,
            status: 'ok',
        };

        expect(describeCheckpoint(checkpoint))
            .toBe('   3  ok        accept                        2025-09-02T12:00:00.000Z  next: (end)');
    });

    it('should show the error of a failed sub-task', () => {
        const checkpoint: PipelineCheckpoint = {
            runId: 'run-1',
            nodeName: 'fetch_sources/0:desk',
            seq: 12,
            statePayload: {
                kind: 'subtask',
                output: null,
                error: { name: 'FetchError', code: 'FETCH_ERROR', message: 'Source "desk" failed: status 503' },
            },
            timestamp: TIMESTAMP,
            status: 'failed',
        };

        expect(describeCheckpoint(checkpoint))
            .toBe('  12  failed    fetch_sources/0:desk          2025-09-02T12:00:00.000Z  error: Source "desk" failed: status 503');
    });

    it('should note stored sub-task output', () => {
        const checkpoint: PipelineCheckpoint = {
            runId: 'run-1',
            nodeName: 'fetch_sources/1:feed',
            seq: 2,
            statePayload: { kind: 'subtask', output: [] },
            timestamp: TIMESTAMP,
            status: 'ok',
        };

        expect(describeCheckpoint(checkpoint))
            .toBe('   2  ok        fetch_sources/1:feed          2025-09-02T12:00:00.000Z  sub-task output stored');
    });
});
