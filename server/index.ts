#!/usr/bin/env node
/**
 * gridswitch - Daemon Entry Point
 *
 * Loads configuration, connects to Hyprland and starts the command socket,
 * the optional compositor event source and the optional HTTP API.
 */

// Load environment variables from .env file
import 'dotenv/config';

import logger from './utils/logger';
import { ConfigError, DaemonConfig, loadConfig } from './config/daemonConfig';
import { HyprlandWindowManager } from './wm/hyprland';
import { Daemon, startDaemon } from './daemon';
import { version } from '../package.json';

function readConfig(): DaemonConfig {
    try {
        return loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            logger.error(`[Config] Invalid configuration${error.source ? `: file=${error.source}` : ''}`);
            for (const problem of error.problems) {
                logger.error(`[Config]   ${problem}`);
            }
            process.exit(1);
        }
        throw error;
    }
}

// Start daemon with proper async initialization
(async () => {
    const config = readConfig();
    logger.setLevel(config.logLevel);

    // Print banner first - before any other output
    logger.startup('gridswitch', {
        version,
        socket: config.socketPath,
        http: config.http.enabled ? config.http.port : 'off',
        events: config.events.enabled,
    });
    logger.info(`[Config] ${config.source ? `Loaded: file=${config.source}` : 'No config file, using defaults'}`);

    let daemon: Daemon;
    try {
        daemon = await startDaemon({ config, wm: new HyprlandWindowManager(), version });
    } catch (error) {
        logger.error(`[Startup] Failed to start daemon: error="${error instanceof Error ? error.message : String(error)}"`);
        process.exit(1);
    }

    logger.info('[Daemon] Ready ✓');

    let shuttingDown = false;
    const shutdown = (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`${signal} received, shutting down gracefully`);
        daemon.stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error(`[Daemon] Shutdown failed: error="${error instanceof Error ? error.message : String(error)}"`);
                process.exit(1);
            });
    };

    // Graceful shutdown
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
})().catch((error: unknown) => {
    logger.error(`[Startup] Unexpected error: error="${error instanceof Error ? error.message : String(error)}"`);
    process.exit(1);
});
