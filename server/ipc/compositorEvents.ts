/**
 * Compositor Event Source
 *
 * Reads Hyprland's event socket (`.socket2.sock`) and forwards touchpad
 * swipe events as raw Swipe* commands. No accumulation happens here: the
 * switcher owns gesture state, exactly as it does for swipes forwarded by
 * the native plugin.
 *
 *   swipebegin>>3            → SwipeBegin { fingers: 3 }
 *   swipeupdate>>3,12.5,-4   → SwipeUpdate { fingers: 3, dx: 12.5, dy: -4 }
 *   swipeend>>3              → SwipeEnd
 *
 * The connection is re-established with exponential backoff when the
 * compositor restarts.
 */

import net from 'net';
import { createInterface } from 'readline';
import logger from '../utils/logger';
import type { Command } from '../../shared/types/command';
import type { CommandSink } from './socketListener';

// ============================================================================
// LINE TRANSLATION
// ============================================================================

/**
 * Translate one `EVENT>>DATA` line. Returns null for anything that is not
 * a well-formed swipe event. A namespace prefix (`touchpad:swipebegin`)
 * is stripped.
 */
export function translateEventLine(line: string): Command | null {
    const separator = line.indexOf('>>');
    if (separator === -1) return null;

    const rawEvent = line.slice(0, separator);
    const data = line.slice(separator + 2).trim();
    const event = rawEvent.slice(rawEvent.lastIndexOf(':') + 1);

    switch (event) {
        case 'swipebegin': {
            const fingers = parseFingers(data);
            return fingers === null ? null : { type: 'SwipeBegin', fingers };
        }
        case 'swipeupdate': {
            const parts = data.split(',');
            if (parts.length !== 3) return null;
            const fingers = parseFingers(parts[0]);
            const dx = parseDelta(parts[1]);
            const dy = parseDelta(parts[2]);
            if (fingers === null || dx === null || dy === null) return null;
            return { type: 'SwipeUpdate', fingers, dx, dy };
        }
        case 'swipeend':
            return { type: 'SwipeEnd' };
        default:
            return null;
    }
}

function parseFingers(text: string): number | null {
    const trimmed = text.trim();
    if (!/^\d+$/.test(trimmed)) return null;
    return parseInt(trimmed, 10);
}

function parseDelta(text: string): number | null {
    const trimmed = text.trim();
    if (!trimmed) return null;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : null;
}

/**
 * `$XDG_RUNTIME_DIR/hypr/$HYPRLAND_INSTANCE_SIGNATURE/.socket2.sock`,
 * or null when either variable is missing.
 */
export function resolveEventSocketPath(env: NodeJS.ProcessEnv = process.env): string | null {
    const runtimeDir = env.XDG_RUNTIME_DIR;
    const signature = env.HYPRLAND_INSTANCE_SIGNATURE;
    if (!runtimeDir || !signature) return null;
    return `${runtimeDir}/hypr/${signature}/.socket2.sock`;
}

// ============================================================================
// EVENT SOURCE
// ============================================================================

export interface CompositorEventSourceOptions {
    path: string;
    sink: CommandSink;
}

export class CompositorEventSource {
    private socket: net.Socket | null = null;
    private reconnectTimer: NodeJS.Timeout | null = null;
    private reconnectAttempts = 0;
    private stopped = true;
    private loggedFirstSwipe = false;

    private static readonly RECONNECT_INITIAL = 1_000;          // 1 second
    private static readonly RECONNECT_MAX = 120_000;            // 2 minutes

    constructor(private readonly options: CompositorEventSourceOptions) { }

    get isConnected(): boolean {
        return this.socket !== null && !this.socket.connecting && !this.socket.destroyed;
    }

    start(): void {
        if (!this.stopped) return;
        this.stopped = false;
        this.connect();
    }

    stop(): void {
        this.stopped = true;
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
        if (this.socket) {
            this.socket.destroy();
            this.socket = null;
        }
        logger.debug('[Events] Stopped');
    }

    private connect(): void {
        const socket = net.createConnection(this.options.path);
        this.socket = socket;

        socket.on('connect', () => {
            this.reconnectAttempts = 0;
            logger.info(`[Events] Connected: path=${this.options.path}`);
        });

        const lines = createInterface({ input: socket, crlfDelay: Infinity });
        lines.on('line', line => this.handleLine(line));

        socket.on('error', error => {
            logger.warn(`[Events] Socket error: path=${this.options.path} error="${error.message}"`);
        });

        socket.on('close', () => {
            lines.close();
            if (this.socket === socket) {
                this.socket = null;
            }
            this.scheduleReconnect();
        });
    }

    private handleLine(line: string): void {
        const command = translateEventLine(line);
        if (!command) return;

        if (!this.loggedFirstSwipe) {
            this.loggedFirstSwipe = true;
            logger.info('[Events] Receiving swipe events from compositor');
        }
        void this.options.sink.enqueue(command, 'compositor');
    }

    private scheduleReconnect(): void {
        if (this.stopped) return;

        const delay = Math.min(
            CompositorEventSource.RECONNECT_INITIAL * Math.pow(2, this.reconnectAttempts),
            CompositorEventSource.RECONNECT_MAX
        );
        this.reconnectAttempts++;

        logger.debug(`[Events] Reconnecting: attempt=${this.reconnectAttempts} delay=${delay}ms`);
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            if (!this.stopped) {
                this.connect();
            }
        }, delay);
    }
}
