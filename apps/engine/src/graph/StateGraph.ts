/**
 * Stage Graph
 *
 * Nodes transform a state value; edges say which node runs next. A node
 * has either one plain edge or one conditional edge (a router whose label
 * picks the target), or it is an end node.
 */

import { ConfigError, SerializedError } from '../errors';
import type { Logger } from '../logger';

export interface FanOutTask<T> {
    key: string;
    /**
     * The signal aborts when the cancellation grace period runs out, not when the run is cancelled
     */
    run(signal: AbortSignal): Promise<T>;
    /**
     * Rebuild the output from a stored sub-task checkpoint; null re-runs the task
     */
    restore?(output: unknown): T | null;
}

export type FanOutResult<T> =
    | { key: string; status: 'ok'; value: T; restored: boolean }
    | { key: string; status: 'failed'; error: SerializedError };

export interface FanOutOptions {
    concurrency?: number;
}

export interface NodeContext {
    runId: string;
    nodeName: string;
    attempt: number;
    signal: AbortSignal;
    logger: Logger;
    fanOut<T>(tasks: FanOutTask<T>[], options?: FanOutOptions): Promise<FanOutResult<T>[]>;
}

export interface GraphNode<S> {
    name: string;
    /**
     * Extra attempts after a failure, each recorded as a retrying checkpoint
     */
    retries?: number;
    run(state: S, context: NodeContext): Promise<S>;
}

export type Router<S> = (state: S) => string;

export interface ConditionalEdge<S> {
    router: Router<S>;
    targets: Readonly<Record<string, string>>;
}

export interface CompiledGraph<S> {
    readonly entry: string;
    readonly nodes: ReadonlyMap<string, GraphNode<S>>;
    readonly edges: ReadonlyMap<string, string>;
    readonly conditionalEdges: ReadonlyMap<string, ConditionalEdge<S>>;
    readonly ends: ReadonlySet<string>;
}

export class StateGraph<S> {
    private readonly nodes = new Map<string, GraphNode<S>>();
    private readonly edges = new Map<string, string>();
    private readonly conditionalEdges = new Map<string, ConditionalEdge<S>>();
    private readonly ends = new Set<string>();
    private entry: string | null = null;
    private readonly issues: string[] = [];

    addNode(node: GraphNode<S>): this {
        if (this.nodes.has(node.name)) {
            this.issues.push(`Duplicate node "${node.name}"`);
        }
        this.nodes.set(node.name, node);
        return this;
    }

    addEdge(from: string, to: string): this {
        if (this.edges.has(from) || this.conditionalEdges.has(from)) {
            this.issues.push(`Node "${from}" has more than one outgoing edge`);
        }
        this.edges.set(from, to);
        return this;
    }

    addConditionalEdges(from: string, router: Router<S>, targets: Record<string, string>): this {
        if (this.edges.has(from) || this.conditionalEdges.has(from)) {
            this.issues.push(`Node "${from}" has more than one outgoing edge`);
        }
        this.conditionalEdges.set(from, { router, targets: { ...targets } });
        return this;
    }

    setEntryPoint(name: string): this {
        this.entry = name;
        return this;
    }

    setFinishPoint(name: string): this {
        this.ends.add(name);
        return this;
    }

    /**
     * Check every reference; any problem rejects the whole graph
     */
    compile(): CompiledGraph<S> {
        const issues = [...this.issues];
        const known = (name: string) => this.nodes.has(name);

        if (this.entry === null) {
            issues.push('No entry point set');
        } else if (!known(this.entry)) {
            issues.push(`Entry point "${this.entry}" is not a node`);
        }

        for (const [from, to] of this.edges) {
            if (!known(from)) issues.push(`Edge from unknown node "${from}"`);
            if (!known(to)) issues.push(`Edge from "${from}" to unknown node "${to}"`);
        }

        for (const [from, edge] of this.conditionalEdges) {
            if (!known(from)) issues.push(`Conditional edge from unknown node "${from}"`);
            const labels = Object.keys(edge.targets);
            if (labels.length === 0) issues.push(`Conditional edge from "${from}" has no targets`);
            for (const label of labels) {
                const target = edge.targets[label];
                if (!known(target)) {
                    issues.push(`Conditional edge "${from}" -> "${label}" targets unknown node "${target}"`);
                }
            }
        }

        for (const end of this.ends) {
            if (!known(end)) issues.push(`End node "${end}" is not a node`);
            if (this.edges.has(end) || this.conditionalEdges.has(end)) {
                issues.push(`End node "${end}" has an outgoing edge`);
            }
        }

        for (const name of this.nodes.keys()) {
            if (!this.ends.has(name) && !this.edges.has(name) && !this.conditionalEdges.has(name)) {
                issues.push(`Node "${name}" has no outgoing edge and is not an end node`);
            }
        }

        if (issues.length > 0 || this.entry === null) {
            throw new ConfigError(`Invalid pipeline graph: ${issues.join('; ')}`, issues);
        }

        return {
            entry: this.entry,
            nodes: new Map(this.nodes),
            edges: new Map(this.edges),
            conditionalEdges: new Map(this.conditionalEdges),
            ends: new Set(this.ends),
        };
    }
}

export default StateGraph;
