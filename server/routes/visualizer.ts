/**
 * Visualizer Routes
 *
 * GET /api/state               - current switcher snapshot
 * GET /api/visualizer/stream   - SSE feed of visualizer notifications
 */

import { Router, Request, Response } from 'express';
import logger from '../utils/logger';
import type { SwitcherSnapshot } from '../../shared/types/visualizer';
import { HEARTBEAT_INTERVAL_MS, VisualizerStream } from '../services/visualizerStream';

export interface VisualizerRouteDeps {
    snapshot: () => SwitcherSnapshot;
    stream: VisualizerStream;
    heartbeatMs?: number;
}

export function createStateRouter(deps: VisualizerRouteDeps): Router {
    const router = Router();

    router.get('/', (_req: Request, res: Response) => {
        res.json(deps.snapshot());
    });

    return router;
}

export function createVisualizerRouter(deps: VisualizerRouteDeps): Router {
    const router = Router();
    const heartbeatMs = deps.heartbeatMs ?? HEARTBEAT_INTERVAL_MS;

    /**
     * GET /api/visualizer/stream
     * Sends a `snapshot` event first, then one event per notification,
     * named by its type.
     */
    router.get('/stream', (req: Request, res: Response) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const clientId = deps.stream.addClient(res, deps.snapshot());

        const heartbeat = setInterval(() => deps.stream.heartbeat(clientId), heartbeatMs);

        const cleanup = () => {
            clearInterval(heartbeat);
            deps.stream.removeClient(clientId);
        };

        res.on('close', () => {
            cleanup();
            logger.debug(`[VisualizerSSE] Stream closed: client=${clientId}`);
        });
        req.on('error', cleanup);
    });

    return router;
}
