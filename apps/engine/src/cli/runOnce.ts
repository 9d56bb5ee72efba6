#!/usr/bin/env node
/**
 * Run Once CLI
 *
 * Run (or resume) a single pipeline run: load sources, fetch, dedupe,
 * score, draft, validate, then store the script or escalate it.
 *
 * Usage: npm run run:once -- --config path/to/run.json [--run-id id --resume]
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config, { validateConfig } from '../config';
import { closePool } from '../db';
import { errorMessage } from '../errors';
import { loadPipelineDocument } from '../graph/definition';
import { createLogger } from '../logger';
import { runPipeline } from '../pipeline/orchestrator';
import { loadRunConfig } from '../pipeline/runConfig';

const logger = createLogger('run-once');

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
        .option('run-id', {
            type: 'string',
            description: 'Run id; required with --resume',
        })
        .option('resume', {
            type: 'boolean',
            default: false,
            description: 'Continue the run from its latest successful checkpoint',
        })
        .check(args => {
            if (args.resume && !args['run-id']) {
                throw new Error('--resume requires --run-id');
            }
            return true;
        })
        .help()
        .parse();

    const controller = new AbortController();
    const cancel = (signal: string) => {
        logger.warn(`Received ${signal}, cancelling run`);
        controller.abort();
    };
    process.once('SIGINT', () => cancel('SIGINT'));
    process.once('SIGTERM', () => cancel('SIGTERM'));

    try {
        validateConfig();
        const runConfig = loadRunConfig(argv.config);
        const document = argv.pipeline ? loadPipelineDocument(argv.pipeline) : undefined;

        const result = await runPipeline(runConfig, {
            runId: argv['run-id'],
            resume: argv.resume,
            signal: controller.signal,
            document,
        });

        console.log('\n=== Pipeline Run ===');
        console.log(`Run id:            ${result.runId}`);
        console.log(`Outcome:           ${result.outcome}`);
        console.log(`Nodes executed:    ${result.executed.join(' -> ') || '(none)'}`);
        if (result.resumedFrom) {
            console.log(`Resumed after:     ${result.resumedFrom}`);
        }
        console.log(`Attempts used:     ${result.diagnostics.attemptsUsed}`);
        console.log(`Fetch failures:    ${result.diagnostics.fetchFailures.length}`);
        console.log(`Duplicates removed: ${result.diagnostics.dedupRemovedCount}`);
        if (result.artifact) {
            console.log(`Artifact:          ${result.artifact.location}`);
        }
        if (result.review) {
            console.log(`Escalated:         ${result.review.reason}`);
        }
        console.log('');

        if (result.outcome === 'failed' || result.outcome === 'cancelled') {
            throw new Error(result.error?.message ?? `Run ${result.outcome}`);
        }

        logger.info('Pipeline run completed', { runId: result.runId, outcome: result.outcome });
    } catch (error) {
        logger.error('Pipeline run failed', { error: errorMessage(error) });
        throw error;
    } finally {
        await closePool();
    }
}

main()
    .then(() => process.exit(0))
    .catch(() => process.exit(1));
