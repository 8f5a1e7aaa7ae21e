/**
 * Command Routes
 *
 * HTTP transport for the command queue. The body is one command in wire
 * format, e.g. `{"Go":"Right"}` or `"ToggleVisualizer"`.
 */

import { Router, Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import type { Command } from '../../shared/types/command';
import { describeCommand } from '../../shared/types/command';
import { decodeCommand, WireFormatError } from '../ipc/wireFormat';
import type { CommandSink } from '../ipc/socketListener';

export function createCommandsRouter(sink: CommandSink): Router {
    const router = Router();

    /**
     * POST /api/commands
     * Enqueue one command and answer with its result once handled.
     * A command that was accepted but failed still answers 200.
     */
    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        let command: Command;
        try {
            command = decodeCommand(req.body);
        } catch (error) {
            if (error instanceof WireFormatError) {
                logger.warn(`[Commands] Rejected: error="${error.message}"`);
                return res.status(400).json({
                    success: false,
                    error: { code: 'MALFORMED_COMMAND', message: error.message }
                });
            }
            return next(error);
        }

        try {
            const result = await sink.enqueue(command, `http:${req.ip}`);
            if (!result.ok) {
                return res.json({
                    success: false,
                    error: { code: result.error.code, message: result.error.message }
                });
            }

            logger.debug(`[Commands] Handled: command=${describeCommand(command)}`);
            return res.json({ success: true });
        } catch (error) {
            return next(error);
        }
    });

    return router;
}
