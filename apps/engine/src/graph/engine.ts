/**
 * Stage Graph Engine
 *
 * Runs a compiled graph from its entry node, writing a checkpoint after
 * every node before moving on. A resumed run restores the state of the
 * latest ok node checkpoint and continues at the node it recorded as next.
 */

import pLimit from 'p-limit';
import config from '../config';
import { RunCancelled, SerializedError, serializeError, StageFailure } from '../errors';
import { createLogger } from '../logger';
import {
    CheckpointPayload,
    CheckpointStatus,
    CheckpointStore,
    PipelineCheckpoint,
} from '../storage/checkpoints';
import { AbortedError } from '../utils/retry';
import { CompiledGraph, FanOutOptions, FanOutResult, FanOutTask, GraphNode, NodeContext } from './StateGraph';

const logger = createLogger('graph');

export type RunStatus = 'completed' | 'failed' | 'cancelled';

export interface RunOptions<S> {
    store: CheckpointStore;
    /**
     * Narrow a stored state payload; null rejects the checkpoint
     */
    restore: (payload: unknown) => S | null;
    resume?: boolean;
    signal?: AbortSignal;
    maxSteps?: number;
    concurrency?: number;
    cancelGraceMs?: number;
    clock?: () => Date;
}

export interface RunResult<S> {
    runId: string;
    status: RunStatus;
    state: S;
    lastNode: string | null;
    executed: string[];
    resumedFrom: string | null;
    error: SerializedError | null;
}

type NodeOutcome<S> =
    | { ok: true; state: S }
    | { ok: false; cancelled: boolean; error: unknown };

/**
 * Sequenced writer for one run's checkpoints
 */
class Checkpointer {
    constructor(
        private readonly store: CheckpointStore,
        private readonly runId: string,
        private seq: number,
        private readonly clock: () => Date
    ) { }

    async write(nodeName: string, status: CheckpointStatus, statePayload: CheckpointPayload): Promise<void> {
        const checkpoint: PipelineCheckpoint = {
            runId: this.runId,
            nodeName,
            seq: this.seq++,
            statePayload,
            timestamp: this.clock().toISOString(),
            status,
        };
        await this.store.put(checkpoint);
    }
}

/**
 * Rejects with RunCancelled once the grace period after an abort has passed,
 * calling onExpire first
 */
function graceDeadline(signal: AbortSignal, graceMs: number, runId: string, nodeName: string, onExpire: () => void) {
    let timer: NodeJS.Timeout | undefined;
    let onAbort = (): void => undefined;

    const promise = new Promise<never>((_resolve, reject) => {
        onAbort = () => {
            timer = setTimeout(() => {
                onExpire();
                reject(new RunCancelled(runId, nodeName));
            }, graceMs);
        };
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }
    });

    return {
        promise,
        dispose(): void {
            if (timer) clearTimeout(timer);
            signal.removeEventListener('abort', onAbort);
        },
    };
}

function isCancellation(error: unknown, signal: AbortSignal): boolean {
    return signal.aborted || error instanceof RunCancelled || error instanceof AbortedError;
}

export function resolveNext<S>(graph: CompiledGraph<S>, nodeName: string, state: S): string | null {
    if (graph.ends.has(nodeName)) return null;

    const conditional = graph.conditionalEdges.get(nodeName);
    if (conditional) {
        const label = conditional.router(state);
        const target = conditional.targets[label];
        if (!target) {
            throw new StageFailure(nodeName, `Router returned unknown route "${label}"`);
        }
        return target;
    }

    return graph.edges.get(nodeName) ?? null;
}

/**
 * Execute a graph for one run
 */
export async function runGraph<S>(
    graph: CompiledGraph<S>,
    initialState: S,
    runId: string,
    options: RunOptions<S>
): Promise<RunResult<S>> {
    const signal = options.signal ?? new AbortController().signal;
    const maxSteps = options.maxSteps ?? config.engine.maxSteps;
    const defaultConcurrency = options.concurrency ?? config.engine.fetchConcurrency;
    const graceMs = options.cancelGraceMs ?? config.engine.cancelGraceMs;
    const clock = options.clock ?? (() => new Date());

    const prior = options.resume ? await options.store.list(runId) : [];
    const checkpointer = new Checkpointer(
        options.store,
        runId,
        prior.reduce((next, checkpoint) => Math.max(next, checkpoint.seq + 1), 0),
        clock
    );

    // Outputs of sub-tasks that finished before an interruption
    const finishedSubtasks = new Map<string, unknown>();
    for (const checkpoint of prior) {
        if (checkpoint.statePayload.kind !== 'subtask') continue;
        if (checkpoint.status === 'ok') {
            finishedSubtasks.set(checkpoint.nodeName, checkpoint.statePayload.output);
        } else {
            finishedSubtasks.delete(checkpoint.nodeName);
        }
    }

    let state = initialState;
    let current: string | null = graph.entry;
    let lastNode: string | null = null;
    let resumedFrom: string | null = null;
    const executed: string[] = [];

    for (let index = prior.length - 1; index >= 0; index--) {
        const checkpoint = prior[index];
        if (checkpoint.status !== 'ok' || checkpoint.statePayload.kind !== 'node') continue;

        const restored = options.restore(checkpoint.statePayload.state);
        if (restored === null) {
            const error = new StageFailure('engine', `Checkpoint ${checkpoint.seq} of run ${runId} cannot be restored`);
            logger.error('Resume failed', { runId, node: checkpoint.nodeName });
            return { runId, status: 'failed', state, lastNode, executed, resumedFrom, error: serializeError(error) };
        }
        state = restored;
        current = checkpoint.statePayload.next;
        lastNode = checkpoint.nodeName;
        resumedFrom = checkpoint.nodeName;
        logger.info('Resuming run', { runId, after: checkpoint.nodeName, next: current });
        break;
    }

    const fail = async (
        nodeName: string,
        status: 'failed' | 'cancelled',
        error: unknown
    ): Promise<RunResult<S>> => {
        const serialized = serializeError(error);
        await checkpointer.write(nodeName, 'failed', { kind: 'node', state, next: nodeName, error: serialized });
        logger.error(status === 'cancelled' ? 'Run cancelled' : 'Run failed', {
            runId,
            node: nodeName,
            error: serialized.message,
        });
        return { runId, status, state, lastNode, executed, resumedFrom, error: serialized };
    };

    const contextFor = (nodeName: string, attempt: number): NodeContext => ({
        runId,
        nodeName,
        attempt,
        signal,
        logger: createLogger(nodeName, { runId }),
        fanOut: <T>(tasks: FanOutTask<T>[], fanOutOptions: FanOutOptions = {}) =>
            fanOut(tasks, nodeName, fanOutOptions.concurrency ?? defaultConcurrency),
    });

    const fanOut = async <T>(
        tasks: FanOutTask<T>[],
        nodeName: string,
        concurrency: number
    ): Promise<FanOutResult<T>[]> => {
        const limit = pLimit(Math.max(1, concurrency));
        // Sub-tasks see this signal, not the run's: it fires when the grace period ends
        const taskController = new AbortController();
        const deadline = graceDeadline(signal, graceMs, runId, nodeName, () => taskController.abort());

        const runTask = async (task: FanOutTask<T>): Promise<FanOutResult<T>> => {
            const subName = `${nodeName}/${task.key}`;

            if (finishedSubtasks.has(subName) && task.restore) {
                const value = task.restore(finishedSubtasks.get(subName));
                if (value !== null) {
                    logger.debug('Sub-task restored from checkpoint', { runId, subtask: subName });
                    return { key: task.key, status: 'ok', value, restored: true };
                }
            }

            if (signal.aborted) {
                return { key: task.key, status: 'failed', error: serializeError(new RunCancelled(runId, subName)) };
            }

            try {
                const value = await Promise.race([task.run(taskController.signal), deadline.promise]);
                await checkpointer.write(subName, 'ok', { kind: 'subtask', output: value });
                return { key: task.key, status: 'ok', value, restored: false };
            } catch (error) {
                const serialized = serializeError(error);
                if (!isCancellation(error, signal)) {
                    await checkpointer.write(subName, 'failed', { kind: 'subtask', output: null, error: serialized });
                }
                return { key: task.key, status: 'failed', error: serialized };
            }
        };

        try {
            const results = await Promise.all(tasks.map(task => limit(() => runTask(task))));
            if (signal.aborted) {
                throw new RunCancelled(runId, nodeName);
            }
            return results;
        } finally {
            deadline.dispose();
        }
    };

    const runNode = async (node: GraphNode<S>): Promise<NodeOutcome<S>> => {
        const retries = Math.max(0, node.retries ?? 0);
        for (let attempt = 1; ; attempt++) {
            try {
                const next = await node.run(structuredClone(state), contextFor(node.name, attempt));
                return { ok: true, state: next };
            } catch (error) {
                if (isCancellation(error, signal)) {
                    return { ok: false, cancelled: true, error: new RunCancelled(runId, node.name) };
                }
                if (attempt > retries) {
                    return { ok: false, cancelled: false, error };
                }
                logger.warn('Node failed, retrying', {
                    runId,
                    node: node.name,
                    attempt,
                    error: serializeError(error).message,
                });
                await checkpointer.write(node.name, 'retrying', {
                    kind: 'node',
                    state,
                    next: node.name,
                    error: serializeError(error),
                });
            }
        }
    };

    let steps = 0;
    while (current !== null) {
        const nodeName: string = current;

        if (signal.aborted) {
            return fail(nodeName, 'cancelled', new RunCancelled(runId, nodeName));
        }

        steps++;
        if (steps > maxSteps) {
            return fail(nodeName, 'failed', new StageFailure('engine', `Step limit of ${maxSteps} reached before "${nodeName}"`));
        }

        const node = graph.nodes.get(nodeName);
        if (!node) {
            return fail(nodeName, 'failed', new StageFailure('engine', `Unknown node "${nodeName}"`));
        }

        logger.debug('Running node', { runId, node: nodeName, step: steps });
        const outcome = await runNode(node);
        if (!outcome.ok) {
            return fail(nodeName, outcome.cancelled ? 'cancelled' : 'failed', outcome.error);
        }

        let next: string | null;
        try {
            next = resolveNext(graph, nodeName, outcome.state);
        } catch (error) {
            return fail(nodeName, 'failed', error);
        }

        await checkpointer.write(nodeName, 'ok', { kind: 'node', state: outcome.state, next });
        for (const subName of [...finishedSubtasks.keys()]) {
            if (subName.startsWith(`${nodeName}/`)) finishedSubtasks.delete(subName);
        }

        executed.push(nodeName);
        state = outcome.state;
        lastNode = nodeName;
        current = next;
    }

    logger.info('Run completed', { runId, lastNode, steps: executed.length });
    return { runId, status: 'completed', state, lastNode, executed, resumedFrom, error: null };
}

export default { runGraph, resolveNext };
