/**
 * Command Socket Listener
 *
 * Unix stream socket transport. Any number of clients may connect at once;
 * each sends newline-delimited wire commands which are decoded and pushed
 * into the shared command queue in the order their lines complete.
 *
 * A malformed line is logged and skipped. The connection stays open.
 */

import net from 'net';
import fs from 'fs';
import { createInterface } from 'readline';
import logger from '../utils/logger';
import type { Command } from '../../shared/types/command';
import { describeCommand } from '../../shared/types/command';
import type { CommandResult } from '../switcher/errors';
import { parseCommandLine, WireFormatError } from './wireFormat';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Where decoded commands go. Implemented by CommandQueue.
 */
export interface CommandSink {
    enqueue(command: Command, source: string): Promise<CommandResult>;
}

export interface SocketListenerOptions {
    path: string;
    sink: CommandSink;
}

// ============================================================================
// LISTENER
// ============================================================================

export class CommandSocketListener {
    private server: net.Server | null = null;
    private readonly connections: Set<net.Socket> = new Set();
    private connectionCounter = 0;

    constructor(private readonly options: SocketListenerOptions) { }

    get path(): string {
        return this.options.path;
    }

    get connectionCount(): number {
        return this.connections.size;
    }

    /**
     * Bind the socket, replacing any stale socket file left by a crash.
     */
    async start(): Promise<void> {
        if (this.server) return;

        fs.rmSync(this.options.path, { force: true });

        const server = net.createServer(socket => this.handleConnection(socket));
        this.server = server;

        await new Promise<void>((resolve, reject) => {
            const onError = (error: Error) => {
                this.server = null;
                reject(error);
            };
            server.once('error', onError);
            server.listen(this.options.path, () => {
                server.off('error', onError);
                resolve();
            });
        });

        server.on('error', error => {
            logger.error(`[Socket] Server error: error="${error.message}"`);
        });

        logger.info(`[Socket] Listening: path=${this.options.path}`);
    }

    /**
     * Close every client and the server, then remove the socket file.
     */
    async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = null;

        for (const socket of this.connections) {
            socket.destroy();
        }
        this.connections.clear();

        await new Promise<void>(resolve => server.close(() => resolve()));
        fs.rmSync(this.options.path, { force: true });
        logger.info(`[Socket] Stopped: path=${this.options.path}`);
    }

    private handleConnection(socket: net.Socket): void {
        const connectionId = ++this.connectionCounter;
        const source = `socket#${connectionId}`;
        this.connections.add(socket);
        logger.debug(`[Socket] Client connected: connection=${connectionId} clients=${this.connections.size}`);

        const lines = createInterface({ input: socket, crlfDelay: Infinity });

        lines.on('line', line => this.handleLine(line, source));

        socket.on('error', error => {
            logger.debug(`[Socket] Client error: connection=${connectionId} error="${error.message}"`);
        });

        socket.on('close', () => {
            lines.close();
            this.connections.delete(socket);
            logger.debug(`[Socket] Client disconnected: connection=${connectionId} clients=${this.connections.size}`);
        });
    }

    private handleLine(line: string, source: string): void {
        if (!line.trim()) return;

        let command: Command;
        try {
            command = parseCommandLine(line);
        } catch (error) {
            if (error instanceof WireFormatError) {
                logger.warn(`[Socket] Bad command: source=${source} error="${error.message}" line=${JSON.stringify(line)}`);
                return;
            }
            throw error;
        }

        logger.debug(`[Socket] Received: source=${source} command=${describeCommand(command)}`);
        void this.options.sink.enqueue(command, source);
    }
}
