/**
 * Daemon Wiring
 *
 * Builds the switcher, queue and transports from a DaemonConfig and starts
 * them. Returns a handle whose stop() shuts everything down in order:
 * stop accepting input, let queued commands finish, then close outputs.
 */

import { createServer, Server } from 'http';
import logger from './utils/logger';
import type { DaemonConfig } from './config/daemonConfig';
import type { WindowManager } from './wm/types';
import { GridSwitcher } from './switcher/GridSwitcher';
import { CommandQueue } from './switcher/CommandQueue';
import { CommandSocketListener } from './ipc/socketListener';
import { CompositorEventSource, resolveEventSocketPath } from './ipc/compositorEvents';
import { VisualizerBroadcaster } from './services/visualizerBroadcaster';
import { VisualizerStream } from './services/visualizerStream';
import { createApp } from './app';

export interface DaemonOptions {
    config: DaemonConfig;
    wm: WindowManager;
    version: string;
    env?: NodeJS.ProcessEnv;
}

export interface Daemon {
    switcher: GridSwitcher;
    queue: CommandQueue;
    broadcaster: VisualizerBroadcaster;
    listener: CommandSocketListener;
    /** Bound HTTP port, or null when the API is disabled */
    httpPort: number | null;
    stop(): Promise<void>;
}

function listen(server: Server, port: number): Promise<number> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, '127.0.0.1', () => {
            server.off('error', reject);
            const address = server.address();
            resolve(typeof address === 'object' && address !== null ? address.port : port);
        });
    });
}

export async function startDaemon(options: DaemonOptions): Promise<Daemon> {
    const { config, wm } = options;

    const broadcaster = new VisualizerBroadcaster();
    const switcher = new GridSwitcher(wm, { gestures: config.gestures, visualizer: broadcaster });
    const queue = new CommandQueue(command => switcher.handle(command));

    const listener = new CommandSocketListener({ path: config.socketPath, sink: queue });
    await listener.start();

    let events: CompositorEventSource | null = null;
    if (config.events.enabled) {
        const eventPath = resolveEventSocketPath(options.env);
        if (eventPath) {
            events = new CompositorEventSource({ path: eventPath, sink: queue });
            events.start();
        } else {
            logger.warn('[Events] Disabled: XDG_RUNTIME_DIR or HYPRLAND_INSTANCE_SIGNATURE not set');
        }
    }

    let stream: VisualizerStream | null = null;
    let httpServer: Server | null = null;
    let httpPort: number | null = null;
    if (config.http.enabled) {
        stream = new VisualizerStream(broadcaster);
        stream.attach();
        const app = createApp({
            version: options.version,
            queue,
            snapshot: () => switcher.snapshot(),
            stream,
        });
        httpServer = createServer(app);
        try {
            httpPort = await listen(httpServer, config.http.port);
        } catch (error) {
            events?.stop();
            stream.detach();
            await listener.stop();
            throw error;
        }
        logger.info(`[Server] Listening on 127.0.0.1:${httpPort}`);
    }

    const stop = async (): Promise<void> => {
        queue.close();
        events?.stop();
        await listener.stop();
        await queue.drain();

        stream?.detach();
        const server = httpServer;
        if (server) {
            await new Promise<void>(resolve => server.close(() => resolve()));
        }
        logger.info(`[Daemon] Stopped: handled=${queue.handled}`);
    };

    return { switcher, queue, broadcaster, listener, httpPort, stop };
}
