/**
 * Hyprland Window Manager
 *
 * Talks to the compositor's request socket directly:
 *   $XDG_RUNTIME_DIR/hypr/$HYPRLAND_INSTANCE_SIGNATURE/.socket.sock
 *
 * Every call opens a fresh connection, writes one request and reads until
 * the compositor closes the stream. Queries go out as `j/<name>` and come
 * back as JSON; dispatches go out as `/dispatch <args>` and must answer
 * `ok`.
 */

import net from 'net';
import logger from '../utils/logger';
import type { WorkspaceId } from '../grid/Grid';
import { BackendError, classifySocketError } from './errors';
import type { MonitorInfo, WindowInfo, WindowManager } from './types';

export interface HyprlandOptions {
    /** Explicit request socket path. Resolved from the environment when omitted. */
    socketPath?: string;
    /** Per-request timeout in ms */
    timeout?: number;
    env?: NodeJS.ProcessEnv;
}

const DEFAULT_TIMEOUT = 2000;

/**
 * Resolve the request socket path from the environment.
 * @throws BackendError CONFIG_INVALID
 */
export function resolveRequestSocketPath(env: NodeJS.ProcessEnv = process.env): string {
    const runtimeDir = env.XDG_RUNTIME_DIR;
    if (!runtimeDir) {
        throw new BackendError('CONFIG_INVALID', 'XDG_RUNTIME_DIR not set');
    }
    const signature = env.HYPRLAND_INSTANCE_SIGNATURE;
    if (!signature) {
        throw new BackendError('CONFIG_INVALID', 'HYPRLAND_INSTANCE_SIGNATURE not set');
    }
    return `${runtimeDir}/hypr/${signature}/.socket.sock`;
}

// ============================================================================
// REPLY PARSING
// ============================================================================

interface MonitorJson {
    id: number;
    name: string;
    x: number;
    y: number;
    width: number;
    height: number;
    focused: boolean;
}

interface ActiveWindowJson {
    address: string;
    title: string;
    monitor: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(query: string, text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new BackendError('PARSE_FAILED',
            `Invalid JSON from ${query}: ${error instanceof Error ? error.message : String(error)}`,
            { query }
        );
    }
}

function readString(query: string, record: Record<string, unknown>, field: string): string {
    const value = record[field];
    if (typeof value !== 'string') {
        throw new BackendError('PARSE_FAILED', `${query}: field "${field}" missing or not a string`, { query, field });
    }
    return value;
}

function readNumber(query: string, record: Record<string, unknown>, field: string): number {
    const value = record[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new BackendError('PARSE_FAILED', `${query}: field "${field}" missing or not a number`, { query, field });
    }
    return value;
}

export function parseMonitors(text: string): MonitorJson[] {
    const query = 'j/monitors';
    const value = parseJson(query, text);
    if (!Array.isArray(value)) {
        throw new BackendError('PARSE_FAILED', `${query}: expected an array`, { query });
    }
    return value.map((entry: unknown) => {
        if (!isRecord(entry)) {
            throw new BackendError('PARSE_FAILED', `${query}: expected an array of objects`, { query });
        }
        return {
            id: readNumber(query, entry, 'id'),
            name: readString(query, entry, 'name'),
            x: readNumber(query, entry, 'x'),
            y: readNumber(query, entry, 'y'),
            width: readNumber(query, entry, 'width'),
            height: readNumber(query, entry, 'height'),
            focused: entry.focused === true,
        };
    });
}

/** Null when nothing has focus (the compositor answers `{}`). */
export function parseActiveWindow(text: string): ActiveWindowJson | null {
    const query = 'j/activewindow';
    const value = parseJson(query, text);
    if (!isRecord(value)) {
        throw new BackendError('PARSE_FAILED', `${query}: expected an object`, { query });
    }
    if (Object.keys(value).length === 0) return null;
    return {
        address: readString(query, value, 'address'),
        title: readString(query, value, 'title'),
        monitor: readNumber(query, value, 'monitor'),
    };
}

// ============================================================================
// WINDOW MANAGER
// ============================================================================

export class HyprlandWindowManager implements WindowManager {
    private readonly timeout: number;

    constructor(private readonly options: HyprlandOptions = {}) {
        this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    }

    /**
     * Dispatches act on the focused monitor, so focus the target first.
     */
    async switchWorkspace(monitorName: string, workspaceId: WorkspaceId): Promise<void> {
        await this.dispatch(`focusmonitor ${monitorName}`);
        await this.dispatch(`workspace ${workspaceId}`);
    }

    async moveWindowToWorkspace(workspaceId: WorkspaceId): Promise<void> {
        await this.dispatch(`movetoworkspacesilent ${workspaceId}`);
    }

    async moveWindowToMonitor(monitorName: string): Promise<void> {
        await this.dispatch(`movewindow mon:${monitorName}`);
    }

    async monitors(): Promise<MonitorInfo[]> {
        const monitors = parseMonitors(await this.request('j/monitors'));
        return monitors.map((m, index) => ({
            index,
            name: m.name,
            x: m.x,
            y: m.y,
            width: m.width,
            height: m.height,
        }));
    }

    async activeMonitor(): Promise<string | null> {
        const monitors = parseMonitors(await this.request('j/monitors'));
        return monitors.find(m => m.focused)?.name ?? null;
    }

    async activeWindow(): Promise<WindowInfo | null> {
        const window = parseActiveWindow(await this.request('j/activewindow'));
        if (!window) return null;

        const monitors = parseMonitors(await this.request('j/monitors'));
        const monitor = monitors.find(m => m.id === window.monitor);
        if (!monitor) {
            throw new BackendError('PARSE_FAILED',
                `Active window is on unknown monitor id ${window.monitor}`,
                { monitorId: window.monitor }
            );
        }

        return { address: window.address, title: window.title, monitor: monitor.name };
    }

    // ========================================================================
    // IPC
    // ========================================================================

    private socketPath(): string {
        return this.options.socketPath ?? resolveRequestSocketPath(this.options.env);
    }

    private async dispatch(args: string): Promise<void> {
        const reply = (await this.request(`/dispatch ${args}`)).trim();
        if (reply !== 'ok') {
            throw new BackendError('DISPATCH_REJECTED', `dispatch ${args}: ${reply || '(empty reply)'}`, { args, reply });
        }
        logger.debug(`[Hyprland] Dispatched: ${args}`);
    }

    private request(body: string): Promise<string> {
        const path = this.socketPath();

        return new Promise<string>((resolve, reject) => {
            const chunks: Buffer[] = [];
            const socket = net.createConnection(path);
            let settled = false;

            const fail = (error: unknown) => {
                if (settled) return;
                settled = true;
                socket.destroy();
                reject(classifySocketError(error, path));
            };

            socket.setTimeout(this.timeout, () => {
                fail(new Error(`request "${body}" timed out after ${this.timeout}ms`));
            });

            socket.on('connect', () => socket.write(body));
            socket.on('data', (chunk: Buffer) => chunks.push(chunk));
            socket.on('error', fail);
            socket.on('end', () => {
                if (settled) return;
                settled = true;
                socket.destroy();
                resolve(Buffer.concat(chunks).toString('utf8'));
            });
        });
    }
}
