/**
 * Tests for the compositor event source
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import net from 'net';
import fs from 'fs';
import os from 'os';
import path from 'path';

// Mock logger
vi.mock('../utils/logger', () => ({
    default: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

import { CompositorEventSource, resolveEventSocketPath, translateEventLine } from '../ipc/compositorEvents';
import type { Command } from '../../shared/types/command';
import type { CommandResult } from '../switcher/errors';

describe('translateEventLine', () => {
    it('translates swipe events', () => {
        expect(translateEventLine('swipebegin>>3')).toEqual({ type: 'SwipeBegin', fingers: 3 });
        expect(translateEventLine('swipeupdate>>4,12.5,-3')).toEqual({ type: 'SwipeUpdate', fingers: 4, dx: 12.5, dy: -3 });
        expect(translateEventLine('swipeend>>3')).toEqual({ type: 'SwipeEnd' });
    });

    it('strips a namespace prefix', () => {
        expect(translateEventLine('touchpad:swipebegin>>3')).toEqual({ type: 'SwipeBegin', fingers: 3 });
        expect(translateEventLine('a:b:swipeend>>')).toEqual({ type: 'SwipeEnd' });
    });

    it('ignores other events', () => {
        expect(translateEventLine('workspace>>2')).toBeNull();
        expect(translateEventLine('activewindow>>kitty,~')).toBeNull();
        expect(translateEventLine('no separator')).toBeNull();
    });

    it('ignores malformed swipe payloads', () => {
        expect(translateEventLine('swipebegin>>three')).toBeNull();
        expect(translateEventLine('swipebegin>>-1')).toBeNull();
        expect(translateEventLine('swipeupdate>>3,1')).toBeNull();
        expect(translateEventLine('swipeupdate>>3,x,1')).toBeNull();
        expect(translateEventLine('swipeupdate>>3,,1')).toBeNull();
    });
});

describe('resolveEventSocketPath', () => {
    it('builds the path from the runtime dir and instance signature', () => {
        expect(resolveEventSocketPath({ XDG_RUNTIME_DIR: '/run/user/1000', HYPRLAND_INSTANCE_SIGNATURE: 'abc' }))
            .toBe('/run/user/1000/hypr/abc/.socket2.sock');
    });

    it('returns null when either variable is missing', () => {
        expect(resolveEventSocketPath({ XDG_RUNTIME_DIR: '/run/user/1000' })).toBeNull();
        expect(resolveEventSocketPath({ HYPRLAND_INSTANCE_SIGNATURE: 'abc' })).toBeNull();
    });
});

describe('CompositorEventSource', () => {
    let server: net.Server | null = null;
    let source: CompositorEventSource | null = null;
    let dir: string | null = null;

    afterEach(async () => {
        source?.stop();
        source = null;
        const s = server;
        if (s) {
            await new Promise<void>(resolve => s.close(() => resolve()));
        }
        server = null;
        if (dir) fs.rmSync(dir, { recursive: true, force: true });
        dir = null;
    });

    it('forwards swipe events from the event socket', async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gridswitch-events-'));
        const socketPath = path.join(dir, '.socket2.sock');

        const s = net.createServer(conn => {
            conn.write('workspace>>2\nswipebegin>>3\nswipeupdate>>3,10,0\n');
            conn.write('swipeend>>3\n');
        });
        server = s;
        await new Promise<void>(resolve => s.listen(socketPath, resolve));

        const received: Array<{ command: Command; source: string }> = [];
        const sink = {
            async enqueue(command: Command, from: string): Promise<CommandResult> {
                received.push({ command, source: from });
                return { ok: true };
            },
        };

        source = new CompositorEventSource({ path: socketPath, sink });
        source.start();

        const started = Date.now();
        while (received.length < 3 && Date.now() - started < 2000) {
            await new Promise(r => setTimeout(r, 5));
        }

        expect(received).toEqual([
            { command: { type: 'SwipeBegin', fingers: 3 }, source: 'compositor' },
            { command: { type: 'SwipeUpdate', fingers: 3, dx: 10, dy: 0 }, source: 'compositor' },
            { command: { type: 'SwipeEnd' }, source: 'compositor' },
        ]);
        expect(source.isConnected).toBe(true);
    });
});
