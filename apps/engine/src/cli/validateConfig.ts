#!/usr/bin/env node
/**
 * Validate Config CLI
 *
 * Check a run configuration and a pipeline document without running
 * anything. Exits non-zero and lists every issue when either is malformed.
 *
 * Usage: npm run validate:config -- --config run.json [--pipeline graph.json]
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config from '../config';
import { ConfigError, errorMessage } from '../errors';
import { compilePipeline, loadPipelineDocument } from '../graph/definition';
import { createLogger } from '../logger';
import { createPipelineComponents } from '../pipeline/nodes';
import { createPipelineDeps, defaultPipelineDocument, runTemplate } from '../pipeline/orchestrator';
import { loadRunConfig } from '../pipeline/runConfig';

const logger = createLogger('validate-config');

async function main(): Promise<void> {
    const argv = await yargs(hideBin(process.argv))
        .option('config', {
            alias: 'c',
            type: 'string',
            default: config.engine.runConfigPath,
            description: 'Run configuration JSON file',
        })
        .option('pipeline', {
            alias: 'p',
            type: 'string',
            description: 'Pipeline document JSON file (defaults to the bundled graph)',
        })
        .help()
        .parse();

    try {
        const runConfig = loadRunConfig(argv.config);
        const deps = createPipelineDeps({ generator: null });
        const template = runTemplate(runConfig, deps.templates);

        const document = argv.pipeline ? loadPipelineDocument(argv.pipeline) : defaultPipelineDocument();
        const graph = compilePipeline(document, createPipelineComponents(deps));

        console.log('\n=== Configuration OK ===');
        console.log(`Sources:   ${runConfig.sources.map(source => `${source.name} (${source.kind})`).join(', ')}`);
        console.log(`Template:  ${template.id}`);
        console.log(`Graph:     ${graph.nodes.size} nodes, entry "${graph.entry}"`);
        console.log('');
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`\n${error.message}`);
            error.issues.forEach(issue => console.error(`  - ${issue}`));
            console.error('');
        }
        logger.error('Configuration rejected', { error: errorMessage(error) });
        throw error;
    }
}

main()
    .then(() => process.exit(0))
    .catch(() => process.exit(1));
