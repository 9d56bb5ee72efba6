import cron from 'node-cron';
import config from '../config';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { PipelineRunResult, runPipeline } from '../pipeline/orchestrator';
import { loadRunConfig } from '../pipeline/runConfig';

const logger = createLogger('scheduler');

let scheduledTask: cron.ScheduledTask | null = null;
let activeRun: { controller: AbortController; done: Promise<unknown> } | null = null;

/**
 * Start the cron scheduler
 */
export function startScheduler(): void {
    if (!config.scheduler.enabled) {
        logger.info('Scheduler disabled by configuration');
        return;
    }

    const schedule = config.scheduler.cronSchedule;

    if (!cron.validate(schedule)) {
        logger.error('Invalid cron schedule', { schedule });
        throw new Error(`Invalid cron schedule: ${schedule}`);
    }

    logger.info('Starting scheduler', { schedule, runConfig: config.engine.runConfigPath });

    scheduledTask = cron.schedule(schedule, async () => {
        if (activeRun) {
            logger.warn('Previous pipeline run still in progress, skipping this tick');
            return;
        }
        logger.info('Scheduled pipeline run starting');
        try {
            const result = await runNow();
            logger.info('Scheduled pipeline run completed', { runId: result.runId, outcome: result.outcome });
        } catch (error) {
            logger.error('Scheduled pipeline run failed', { error: errorMessage(error) });
        }
    });

    scheduledTask.start();
    logger.info('Scheduler started successfully');
}

/**
 * Stop the cron scheduler, cancel a run in progress and wait for it to
 * write its final checkpoint
 */
export async function stopScheduler(): Promise<void> {
    if (scheduledTask) {
        scheduledTask.stop();
        scheduledTask = null;
        logger.info('Scheduler stopped');
    }
    if (activeRun) {
        const { controller, done } = activeRun;
        controller.abort();
        logger.info('Cancelling in-flight pipeline run');
        await done.catch((error: unknown) => {
            logger.warn('In-flight run ended with an error', { error: errorMessage(error) });
        });
    }
}

/**
 * Run the pipeline immediately with the configured run file
 */
export async function runNow(): Promise<PipelineRunResult> {
    const controller = new AbortController();
    const done = Promise.resolve()
        .then(() => runPipeline(loadRunConfig(config.engine.runConfigPath), { signal: controller.signal }));
    activeRun = { controller, done };
    try {
        return await done;
    } finally {
        activeRun = null;
    }
}

export default { startScheduler, stopScheduler, runNow };
