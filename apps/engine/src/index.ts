import config, { validateConfig } from './config';
import { createLogger } from './logger';
import { checkConnection, closePool } from './db';
import { errorMessage } from './errors';
import { loadRunConfig } from './pipeline/runConfig';
import { startScheduler, stopScheduler } from './scheduler/cron';

const logger = createLogger('main');

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down...`);

    await stopScheduler();
    await closePool();

    logger.info('Shutdown complete');
    process.exit(0);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    logger.info('Briefcast engine starting...', {
        nodeEnv: config.nodeEnv,
        checkpoints: config.storage.checkpointBackend,
        aiProvider: config.ai.provider,
    });

    try {
        validateConfig();
        // Fail fast on a bad run file rather than at the first cron tick
        loadRunConfig(config.engine.runConfigPath);
        logger.info('Configuration validated');

        if (config.storage.checkpointBackend === 'postgres') {
            const dbConnected = await checkConnection();
            if (!dbConnected) {
                throw new Error('Failed to connect to database');
            }
        }

        startScheduler();

        logger.info('Engine is running. Press Ctrl+C to stop.');
    } catch (error) {
        logger.error('Startup failed', { error: errorMessage(error) });
        process.exit(1);
    }
}

// Register shutdown handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason });
    process.exit(1);
});

void main();
