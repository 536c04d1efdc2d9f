import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config/app-config';
import { createStore } from './database';
import { logger } from './utils/logger';

function startServer() {
    logger.info('Starting activities service...');

    const config = loadConfig();
    const store = createStore();
    const app = createApp({ store, config });

    const server = app.listen(config.port, () => {
        logger.info(`Server running at http://localhost:${config.port}`);
        logger.info(`Loaded ${Object.keys(store.activities.list()).length} activities`);
    });

    const shutdown = (signal: string) => {
        logger.info(`${signal} signal received. Starting graceful shutdown...`);
        server.close(err => {
            if (err) {
                logger.logError(err, 'Error during shutdown');
                process.exitCode = 1;
            }

            logger.on('finish', () => process.exit());
            logger.end();
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer();
