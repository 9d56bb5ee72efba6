/**
 * Pipeline Definition Documents
 *
 * A JSON description of the graph (nodes, edges, conditional edges, end
 * nodes, entry point) produced outside the engine. Components and routers
 * are looked up by name in a registry; anything that does not resolve
 * rejects the document before a run starts.
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import { formatIssues } from '../pipeline/runConfig';
import { CompiledGraph, NodeContext, Router, StateGraph } from './StateGraph';

const identifier = z.string().trim().min(1);

export const PipelineDocumentSchema = z.object({
    version: z.literal(1),
    entry: identifier,
    nodes: z.array(z.object({
        id: identifier,
        component: identifier,
        retries: z.number().int().min(0).max(5).default(0),
    })).min(1),
    edges: z.array(z.object({
        from: identifier,
        to: identifier,
    })).default([]),
    conditionalEdges: z.array(z.object({
        from: identifier,
        router: identifier,
        targets: z.record(identifier),
    })).default([]),
    ends: z.array(identifier).min(1),
});

export type PipelineDocument = z.infer<typeof PipelineDocumentSchema>;

export type NodeHandler<S> = (state: S, context: NodeContext) => Promise<S>;

export interface ComponentRegistry<S> {
    nodes: Readonly<Record<string, NodeHandler<S>>>;
    routers: Readonly<Record<string, Router<S>>>;
}

export function parsePipelineDocument(input: unknown): PipelineDocument {
    const result = PipelineDocumentSchema.safeParse(input);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigError(`Invalid pipeline document: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

export function loadPipelineDocument(filePath: string): PipelineDocument {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Cannot load pipeline document at ${filePath}`, [errorMessage(error)]);
    }
    return parsePipelineDocument(parsed);
}

/**
 * Resolve components and routers, then build and check the graph
 */
export function compilePipeline<S>(document: PipelineDocument, registry: ComponentRegistry<S>): CompiledGraph<S> {
    const issues: string[] = [];
    const graph = new StateGraph<S>();

    for (const node of document.nodes) {
        const handler = registry.nodes[node.component];
        if (!handler) {
            issues.push(`Node "${node.id}" uses unknown component "${node.component}"`);
            continue;
        }
        graph.addNode({ name: node.id, retries: node.retries, run: handler });
    }

    for (const edge of document.edges) {
        graph.addEdge(edge.from, edge.to);
    }

    for (const edge of document.conditionalEdges) {
        const router = registry.routers[edge.router];
        if (!router) {
            issues.push(`Conditional edge from "${edge.from}" uses unknown router "${edge.router}"`);
            continue;
        }
        graph.addConditionalEdges(edge.from, router, edge.targets);
    }

    for (const end of document.ends) {
        graph.setFinishPoint(end);
    }
    graph.setEntryPoint(document.entry);

    if (issues.length > 0) {
        throw new ConfigError(`Invalid pipeline document: ${issues.join('; ')}`, issues);
    }

    return graph.compile();
}

export default { parsePipelineDocument, loadPipelineDocument, compilePipeline };
