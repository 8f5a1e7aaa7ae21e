/**
 * Visualizer SSE Stream
 *
 * Keeps the set of connected SSE clients and forwards every broadcaster
 * notification to them as a named event. A client that fails a write is
 * dropped.
 */

import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger';
import type { SwitcherSnapshot, VisualizerEvent } from '../../shared/types/visualizer';
import type { VisualizerBroadcaster } from './visualizerBroadcaster';

// ============================================================================
// TYPES
// ============================================================================

/**
 * The part of an express Response the stream writes to
 */
export interface StreamWriter {
    write(chunk: string): unknown;
    end(): unknown;
}

export interface StreamClient {
    id: string;
    res: StreamWriter;
}

/** Heartbeat comment interval, keeps proxies from closing idle streams */
export const HEARTBEAT_INTERVAL_MS = 25000;

// ============================================================================
// STREAM
// ============================================================================

export class VisualizerStream {
    private readonly clients: Map<string, StreamClient> = new Map();
    private unsubscribe: (() => void) | null = null;

    constructor(private readonly broadcaster: VisualizerBroadcaster) { }

    /**
     * Start forwarding broadcaster notifications. Idempotent.
     */
    attach(): void {
        if (this.unsubscribe) return;
        this.unsubscribe = this.broadcaster.subscribe(event => this.broadcast(event));
    }

    /**
     * Stop forwarding and close every client.
     */
    detach(): void {
        if (this.unsubscribe) {
            this.unsubscribe();
            this.unsubscribe = null;
        }
        for (const client of this.clients.values()) {
            client.res.end();
        }
        this.clients.clear();
    }

    /**
     * Register an SSE response and send it the current snapshot.
     * Headers must already be flushed.
     */
    addClient(res: StreamWriter, snapshot: SwitcherSnapshot): string {
        const id = uuidv4();
        this.clients.set(id, { id, res });
        logger.debug(`[VisualizerSSE] Connected: client=${id} clients=${this.clients.size}`);

        this.send(id, 'snapshot', snapshot);
        return id;
    }

    removeClient(id: string): void {
        if (this.clients.delete(id)) {
            logger.debug(`[VisualizerSSE] Disconnected: client=${id} clients=${this.clients.size}`);
        }
    }

    heartbeat(id: string): void {
        const client = this.clients.get(id);
        if (!client) return;
        try {
            client.res.write(': heartbeat\n\n');
        } catch (error) {
            logger.debug(`[VisualizerSSE] Heartbeat failed: client=${id}`);
            this.removeClient(id);
        }
    }

    get clientCount(): number {
        return this.clients.size;
    }

    broadcast(event: VisualizerEvent): void {
        for (const id of [...this.clients.keys()]) {
            this.send(id, event.type, event);
        }
    }

    private send(id: string, eventType: string, data: unknown): void {
        const client = this.clients.get(id);
        if (!client) return;
        try {
            client.res.write(`event: ${eventType}\n`);
            client.res.write(`data: ${JSON.stringify(data)}\n\n`);
        } catch (error) {
            logger.debug(`[VisualizerSSE] Send failed: client=${id}`);
            this.removeClient(id);
        }
    }
}
