/**
 * Tests for the stage graph engine
 */

import { runGraph } from '../src/graph/engine';
import { StateGraph } from '../src/graph/StateGraph';
import { MemoryCheckpointStore } from '../src/storage/checkpoints';

interface CounterState {
    count: number;
    visited: string[];
}

const INITIAL: CounterState = { count: 0, visited: [] };

function isCounterState(value: unknown): value is CounterState {
    return typeof value === 'object' && value !== null &&
        'count' in value && typeof value.count === 'number' &&
        'visited' in value && Array.isArray(value.visited);
}

const restore = (payload: unknown): CounterState | null => (isCounterState(payload) ? payload : null);

function visit(name: string) {
    return {
        name,
        run: async (state: CounterState): Promise<CounterState> => ({
            ...state,
            visited: [...state.visited, name],
        }),
    };
}

function linearGraph(middle = visit('b')) {
    return new StateGraph<CounterState>()
        .addNode(visit('a'))
        .addNode(middle)
        .addNode(visit('c'))
        .addEdge('a', 'b')
        .addEdge('b', 'c')
        .setEntryPoint('a')
        .setFinishPoint('c')
        .compile();
}

describe('runGraph', () => {
    it('should run nodes in edge order and checkpoint each one', async () => {
        const store = new MemoryCheckpointStore();
        const result = await runGraph(linearGraph(), INITIAL, 'run-linear', { store, restore });

        expect(result.status).toBe('completed');
        expect(result.executed).toEqual(['a', 'b', 'c']);
        expect(result.state.visited).toEqual(['a', 'b', 'c']);

        const checkpoints = await store.list('run-linear');
        expect(checkpoints.map(checkpoint => [checkpoint.seq, checkpoint.nodeName, checkpoint.status]))
            .toEqual([[0, 'a', 'ok'], [1, 'b', 'ok'], [2, 'c', 'ok']]);
        expect(checkpoints.map(checkpoint => checkpoint.statePayload.kind === 'node' ? checkpoint.statePayload.next : 'subtask'))
            .toEqual(['b', 'c', null]);
    });

    it('should follow conditional edges', async () => {
        const graph = new StateGraph<CounterState>()
            .addNode({ name: 'inc', run: async state => ({ ...state, count: state.count + 1 }) })
            .addNode(visit('finish'))
            .addConditionalEdges('inc', state => (state.count < 3 ? 'again' : 'done'), { again: 'inc', done: 'finish' })
            .setEntryPoint('inc')
            .setFinishPoint('finish')
            .compile();

        const result = await runGraph(graph, INITIAL, 'run-loop', { store: new MemoryCheckpointStore(), restore });

        expect(result.executed).toEqual(['inc', 'inc', 'inc', 'finish']);
        expect(result.state.count).toBe(3);
    });

    it('should fail on a route the edge does not know', async () => {
        const graph = new StateGraph<CounterState>()
            .addNode(visit('a'))
            .addNode(visit('b'))
            .addConditionalEdges('a', () => 'elsewhere', { next: 'b' })
            .setEntryPoint('a')
            .setFinishPoint('b')
            .compile();

        const result = await runGraph(graph, INITIAL, 'run-route', { store: new MemoryCheckpointStore(), restore });

        expect(result.status).toBe('failed');
        expect(result.error?.code).toBe('STAGE_FAILURE');
        expect(result.error?.message).toBe('Stage "a" failed: Router returned unknown route "elsewhere"');
    });

    it('should stop at the step limit', async () => {
        const graph = new StateGraph<CounterState>()
            .addNode({ name: 'spin', run: async state => ({ ...state, count: state.count + 1 }) })
            .addNode(visit('never'))
            .addConditionalEdges('spin', () => 'again', { again: 'spin', done: 'never' })
            .setEntryPoint('spin')
            .setFinishPoint('never')
            .compile();

        const result = await runGraph(graph, INITIAL, 'run-spin', {
            store: new MemoryCheckpointStore(),
            restore,
            maxSteps: 5,
        });

        expect(result.status).toBe('failed');
        expect(result.executed).toHaveLength(5);
        expect(result.error?.message).toBe('Stage "engine" failed: Step limit of 5 reached before "spin"');
    });

    it('should retry a failing node and record the retry', async () => {
        let calls = 0;
        const flaky = {
            name: 'b',
            retries: 1,
            run: async (state: CounterState): Promise<CounterState> => {
                calls++;
                if (calls === 1) throw new Error('transient');
                return { ...state, visited: [...state.visited, 'b'] };
            },
        };
        const store = new MemoryCheckpointStore();

        const result = await runGraph(linearGraph(flaky), INITIAL, 'run-retry', { store, restore });

        expect(result.status).toBe('completed');
        expect(calls).toBe(2);
        const statuses = (await store.list('run-retry')).map(checkpoint => `${checkpoint.nodeName}:${checkpoint.status}`);
        expect(statuses).toEqual(['a:ok', 'b:retrying', 'b:ok', 'c:ok']);
    });

    it('should not let a node mutate the state it was given', async () => {
        const mutating = {
            name: 'b',
            retries: 1,
            run: async (state: CounterState): Promise<CounterState> => {
                state.visited.push('mutated');
                throw new Error('after mutation');
            },
        };

        const result = await runGraph(linearGraph(mutating), INITIAL, 'run-mutate', {
            store: new MemoryCheckpointStore(),
            restore,
        });

        expect(result.status).toBe('failed');
        expect(result.state.visited).toEqual(['a']);
    });

    it('should resume after the last successful node', async () => {
        const store = new MemoryCheckpointStore();
        let aCalls = 0;
        const countedA = {
            name: 'a',
            run: async (state: CounterState): Promise<CounterState> => {
                aCalls++;
                return { ...state, visited: [...state.visited, 'a'] };
            },
        };
        const build = (middle: { name: string; run: (state: CounterState) => Promise<CounterState> }) =>
            new StateGraph<CounterState>()
                .addNode(countedA)
                .addNode(middle)
                .addNode(visit('c'))
                .addEdge('a', 'b')
                .addEdge('b', 'c')
                .setEntryPoint('a')
                .setFinishPoint('c')
                .compile();

        const broken = { name: 'b', run: async (): Promise<CounterState> => { throw new Error('disk full'); } };
        const first = await runGraph(build(broken), INITIAL, 'run-resume', { store, restore });
        expect(first.status).toBe('failed');
        expect(first.error?.message).toBe('disk full');

        const second = await runGraph(build(visit('b')), INITIAL, 'run-resume', { store, restore, resume: true });

        expect(second.status).toBe('completed');
        expect(second.resumedFrom).toBe('a');
        expect(second.executed).toEqual(['b', 'c']);
        expect(second.state.visited).toEqual(['a', 'b', 'c']);
        expect(aCalls).toBe(1);

        const seqs = (await store.list('run-resume')).map(checkpoint => checkpoint.seq);
        expect(seqs).toEqual([0, 1, 2, 3]);
    });

    it('should fail a resume whose checkpoint cannot be restored', async () => {
        const store = new MemoryCheckpointStore();
        await runGraph(linearGraph(), INITIAL, 'run-stale', { store, restore });

        const result = await runGraph(linearGraph(), INITIAL, 'run-stale', {
            store,
            restore: () => null,
            resume: true,
        });

        expect(result.status).toBe('failed');
        expect(result.executed).toEqual([]);
    });

    it('should cancel between nodes once the signal aborts', async () => {
        const controller = new AbortController();
        const aborting = {
            name: 'a',
            run: async (state: CounterState): Promise<CounterState> => {
                controller.abort();
                return state;
            },
        };
        const graph = new StateGraph<CounterState>()
            .addNode(aborting)
            .addNode(visit('b'))
            .addEdge('a', 'b')
            .setEntryPoint('a')
            .setFinishPoint('b')
            .compile();
        const store = new MemoryCheckpointStore();

        const result = await runGraph(graph, INITIAL, 'run-cancel', { store, restore, signal: controller.signal });

        expect(result.status).toBe('cancelled');
        expect(result.executed).toEqual(['a']);
        expect(result.error?.code).toBe('RUN_CANCELLED');
        const last = (await store.list('run-cancel')).pop();
        expect(last?.nodeName).toBe('b');
        expect(last?.status).toBe('failed');
    });
});

describe('fanOut', () => {
    function fanOutGraph(
        keys: string[],
        work: (key: string, signal: AbortSignal) => Promise<number>,
        concurrency: number
    ) {
        return new StateGraph<CounterState>()
            .addNode({
                name: 'fan',
                run: async (state, context) => {
                    const results = await context.fanOut(keys.map(key => ({
                        key,
                        run: (signal: AbortSignal) => work(key, signal),
                        restore: (output: unknown) => (typeof output === 'number' ? output : null),
                    })), { concurrency });
                    const failed = results.filter(result => result.status === 'failed');
                    if (failed.length > 0) {
                        throw new Error(`${failed.length} sub-tasks failed`);
                    }
                    const total = results.reduce((sum, result) => sum + (result.status === 'ok' ? result.value : 0), 0);
                    return { ...state, count: total, visited: results.map(result => result.key) };
                },
            })
            .setEntryPoint('fan')
            .setFinishPoint('fan')
            .compile();
    }

    it('should bound concurrency and keep task order', async () => {
        let active = 0;
        let peak = 0;
        const graph = fanOutGraph(['a', 'b', 'c', 'd', 'e', 'f'], async key => {
            active++;
            peak = Math.max(peak, active);
            await new Promise(resolve => setTimeout(resolve, 5));
            active--;
            return key.charCodeAt(0) - 96;
        }, 2);

        const result = await runGraph(graph, INITIAL, 'run-fan', { store: new MemoryCheckpointStore(), restore });

        expect(result.status).toBe('completed');
        expect(peak).toBe(2);
        expect(result.state.visited).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
        expect(result.state.count).toBe(21);
    });

    it('should reuse finished sub-tasks on resume', async () => {
        const store = new MemoryCheckpointStore();
        const calls: string[] = [];
        let failC = true;
        const graph = fanOutGraph(['a', 'b', 'c'], async key => {
            calls.push(key);
            if (key === 'c' && failC) throw new Error('feed down');
            return 1;
        }, 3);

        const first = await runGraph(graph, INITIAL, 'run-fan-resume', { store, restore });
        expect(first.status).toBe('failed');

        const subtasks = (await store.list('run-fan-resume'))
            .filter(checkpoint => checkpoint.statePayload.kind === 'subtask')
            .map(checkpoint => `${checkpoint.nodeName}:${checkpoint.status}`)
            .sort();
        expect(subtasks).toEqual(['fan/a:ok', 'fan/b:ok', 'fan/c:failed']);

        failC = false;
        calls.length = 0;
        const second = await runGraph(graph, INITIAL, 'run-fan-resume', { store, restore, resume: true });

        expect(second.status).toBe('completed');
        expect(calls).toEqual(['c']);
        expect(second.state.count).toBe(3);
    });

    it('should cancel sub-tasks that outlive the grace period', async () => {
        const controller = new AbortController();
        const graph = fanOutGraph(['slow'], () => {
            setTimeout(() => controller.abort(), 5);
            return new Promise<number>(() => undefined);
        }, 1);
        const store = new MemoryCheckpointStore();

        const result = await runGraph(graph, INITIAL, 'run-fan-cancel', {
            store,
            restore,
            signal: controller.signal,
            cancelGraceMs: 10,
        });

        expect(result.status).toBe('cancelled');
        expect(result.error?.code).toBe('RUN_CANCELLED');
        const subtasks = (await store.list('run-fan-cancel')).filter(checkpoint => checkpoint.statePayload.kind === 'subtask');
        expect(subtasks).toEqual([]);
    });

    it('should let an in-flight sub-task finish inside the grace period', async () => {
        const controller = new AbortController();
        const graph = fanOutGraph(['slow'], (_key, signal) => {
            setTimeout(() => controller.abort(), 5);
            return new Promise<number>((resolve, reject) => {
                const timer = setTimeout(() => resolve(7), 30);
                signal.addEventListener('abort', () => {
                    clearTimeout(timer);
                    reject(new Error('aborted before the grace period ended'));
                }, { once: true });
            });
        }, 1);
        const store = new MemoryCheckpointStore();

        const result = await runGraph(graph, INITIAL, 'run-fan-grace', {
            store,
            restore,
            signal: controller.signal,
            cancelGraceMs: 1000,
        });

        expect(result.status).toBe('cancelled');
        const subtasks = (await store.list('run-fan-grace'))
            .filter(checkpoint => checkpoint.statePayload.kind === 'subtask')
            .map(checkpoint => `${checkpoint.nodeName}:${checkpoint.status}`);
        expect(subtasks).toEqual(['fan/slow:ok']);
    });

    it('should abort the sub-task signal once the grace period runs out', async () => {
        const controller = new AbortController();
        let taskAborted = false;
        const graph = fanOutGraph(['slow'], (_key, signal) => {
            signal.addEventListener('abort', () => {
                taskAborted = true;
            }, { once: true });
            setTimeout(() => controller.abort(), 5);
            return new Promise<number>(() => undefined);
        }, 1);

        const result = await runGraph(graph, INITIAL, 'run-fan-expire', {
            store: new MemoryCheckpointStore(),
            restore,
            signal: controller.signal,
            cancelGraceMs: 10,
        });

        expect(result.status).toBe('cancelled');
        expect(taskAborted).toBe(true);
    });
});
