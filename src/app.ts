import express, { Express } from 'express';
import path from 'path';
import { AppConfig, loadConfig } from './config/app-config';
import { createStore, Store } from './database';
import { createServices } from './services';
import { createRouter } from './api/routes';
import { compressionMiddleware, createCorsMiddleware, createRateLimiter, requestLogger } from './api/middleware';
import { createErrorHandler } from './api/errorHandlers';

// Relative static directories are taken from the package root, not the cwd
export const resolveStaticDir = (staticDir: string): string =>
    path.isAbsolute(staticDir) ? staticDir : path.resolve(__dirname, '..', staticDir);

export interface AppOptions {
    store?: Store;
    config?: AppConfig;
}

/**
 * Builds the Express application around one store. Tests pass a fresh store per case.
 */
export function createApp(options: AppOptions = {}): Express {
    const config = options.config ?? loadConfig();
    const store = options.store ?? createStore();
    const services = createServices(store);

    const app = express();
    app.set('trust proxy', ['loopback', 'linklocal', 'uniquelocal']);

    app.use(requestLogger);
    app.use(createCorsMiddleware(config));
    app.use(compressionMiddleware);
    app.use(createRateLimiter(config));
    app.use(express.json());

    app.use('/static', express.static(resolveStaticDir(config.staticDir)));
    app.use('/', createRouter(services, config));

    app.use(createErrorHandler(config.nodeEnv));

    return app;
}
