/**
 * HTTP Application
 *
 * Builds the express app around an already-wired daemon. Kept apart from
 * index.ts so tests can drive it with supertest.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import logger from './utils/logger';
import type { SwitcherSnapshot } from '../shared/types/visualizer';
import type { CommandSink } from './ipc/socketListener';
import { VisualizerStream } from './services/visualizerStream';
import { createCommandsRouter } from './routes/commands';
import { createStateRouter, createVisualizerRouter } from './routes/visualizer';

export interface AppDeps {
    version: string;
    queue: CommandSink;
    snapshot: () => SwitcherSnapshot;
    stream: VisualizerStream;
    heartbeatMs?: number;
}

interface ServerError extends Error {
    status?: number;
    code?: string;
}

export function createApp(deps: AppDeps): Express {
    const app = express();

    // strict: false so a bare string tag ("ToggleVisualizer") is a valid body
    app.use(express.json({ strict: false, limit: '16kb' }));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.debug(`[Request] ${req.method} ${req.path} ip=${req.ip}`);
        next();
    });

    // Health check endpoint
    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok', version: deps.version });
    });

    const routeDeps = { snapshot: deps.snapshot, stream: deps.stream, heartbeatMs: deps.heartbeatMs };

    app.use('/api/state', createStateRouter(routeDeps));
    app.use('/api/commands', createCommandsRouter(deps.queue));
    app.use('/api/visualizer', createVisualizerRouter(routeDeps));

    // 404 handler
    app.use((req: Request, res: Response) => {
        logger.warn(`[Router] 404 Not Found: path=${req.path} method=${req.method}`);
        res.status(404).json({
            success: false,
            error: {
                code: 'NOT_FOUND',
                message: 'Endpoint not found'
            }
        });
    });

    // Error handling middleware
    app.use((err: ServerError, req: Request, res: Response, _next: NextFunction) => {
        const status = err.status || 500;
        logger.error(`[Server] Error: path=${req.path} status=${status} error="${err.message}"`);

        res.status(status).json({
            success: false,
            error: {
                code: status === 400 ? 'MALFORMED_COMMAND' : (err.code || 'INTERNAL_ERROR'),
                message: err.message
            }
        });
    });

    return app;
}
