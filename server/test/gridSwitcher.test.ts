/**
 * Tests for GridSwitcher
 *
 * Drives the switcher with a fake window manager and checks grid movement,
 * backend calls, gesture handling and visualizer notifications.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock logger
vi.mock('../utils/logger', () => ({
    default: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

import { GridSwitcher } from '../switcher/GridSwitcher';
import { DEFAULT_GESTURE_CONFIG, GestureConfig } from '../gestures/types';
import { BackendError } from '../wm/errors';
import type { Command } from '../../shared/types/command';
import type { CommandResult } from '../switcher/errors';
import { FakeWindowManager, RecordingSink, showsCell } from './fakes';

// ============================================================================
// Helpers
// ============================================================================

const PLAIN_SWIPES: GestureConfig = { ...DEFAULT_GESTURE_CONFIG, naturalSwiping: false };

let wm: FakeWindowManager;
let sink: RecordingSink;
let switcher: GridSwitcher;

function build(gestures: GestureConfig = PLAIN_SWIPES): void {
    wm = new FakeWindowManager();
    sink = new RecordingSink();
    switcher = new GridSwitcher(wm, { gestures, visualizer: sink });
}

async function run(...commands: Command[]): Promise<CommandResult[]> {
    const results: CommandResult[] = [];
    for (const command of commands) {
        results.push(await switcher.handle(command));
    }
    return results;
}

function errorCode(result: CommandResult): string | null {
    return result.ok ? null : result.error.code;
}

// ============================================================================
// Navigation
// ============================================================================

describe('GridSwitcher navigation', () => {
    beforeEach(() => build());

    it('Go moves the cursor and switches to the allocated workspace', async () => {
        const [result] = await run({ type: 'Go', direction: 'Right' });

        expect(result).toEqual({ ok: true });
        expect(switcher.position).toEqual({ x: 1, y: 0 });
        expect(wm.calls).toEqual(showsCell(2));
    });

    it('reuses workspace ids on revisits', async () => {
        await run(
            { type: 'Go', direction: 'Right' },
            { type: 'Go', direction: 'Left' },
            { type: 'Go', direction: 'Right' },
        );

        expect(wm.calls).toEqual([...showsCell(2), ...showsCell(1), ...showsCell(2)]);
    });

    it('stays at the edge on Left or Up from the origin', async () => {
        await run({ type: 'Go', direction: 'Left' }, { type: 'Go', direction: 'Up' });

        expect(switcher.position).toEqual({ x: 0, y: 0 });
        expect(switcher.snapshot().visited).toEqual([{ x: 0, y: 0 }]);
        expect(wm.calls).toEqual([...showsCell(1), ...showsCell(1)]);
    });

    it('publishes position-changed after a move', async () => {
        await run({ type: 'Go', direction: 'Down' });

        expect(sink.events).toEqual([{
            type: 'position-changed',
            position: { x: 0, y: 1 },
            workspaceId: 2,
            visited: [{ x: 0, y: 0 }, { x: 0, y: 1 }],
            dimensions: { minX: 0, minY: 0, maxX: 0, maxY: 1, cols: 1, rows: 2 },
        }]);
    });

    it('MoveWindowAndGo sends the window before switching', async () => {
        await run({ type: 'MoveWindowAndGo', direction: 'Down' });

        expect(switcher.position).toEqual({ x: 0, y: 1 });
        expect(wm.calls).toEqual([
            { method: 'moveWindowToWorkspace', workspaceId: 3 },
            ...showsCell(2),
        ]);
    });

    it('SwitchTo is idempotent', async () => {
        await run({ type: 'SwitchTo', x: 3, y: 2 }, { type: 'SwitchTo', x: 3, y: 2 });

        expect(switcher.position).toEqual({ x: 3, y: 2 });
        expect(wm.calls).toEqual([...showsCell(2), ...showsCell(2)]);
    });

    it('keeps the new position when the backend fails', async () => {
        wm.failNext = new BackendError('IPC_UNREACHABLE', 'compositor down');

        const [result] = await run({ type: 'Go', direction: 'Right' });

        expect(result.ok).toBe(false);
        expect(errorCode(result)).toBe('BACKEND_FAILED');
        expect(result.ok ? '' : result.error.message)
            .toBe('Go(Right): window manager error (IPC_UNREACHABLE): compositor down');
        expect(switcher.position).toEqual({ x: 1, y: 0 });
        expect(sink.types()).toEqual(['position-changed']);
    });

    it('reports unexpected exceptions as INTERNAL', async () => {
        wm.failNext = new Error('boom');

        const [result] = await run({ type: 'Go', direction: 'Left' });

        expect(errorCode(result)).toBe('INTERNAL');
        expect(result.ok ? '' : result.error.message).toBe('Go(Left): boom');
    });
});

// ============================================================================
// Workspaces per monitor
// ============================================================================

describe('GridSwitcher workspaces per monitor', () => {
    beforeEach(() => build());

    it('switches every monitor and leaves focus on the focused one', async () => {
        wm.active = 'DP-2';

        await run({ type: 'Go', direction: 'Right' });

        expect(wm.calls).toEqual([
            { method: 'switchWorkspace', monitor: 'DP-1', workspaceId: 3 },
            { method: 'switchWorkspace', monitor: 'DP-2', workspaceId: 4 },
        ]);
        expect(wm.active).toBe('DP-2');
    });

    it('sends a carried window to the focused monitor\'s workspace', async () => {
        wm.active = 'DP-2';

        await run({ type: 'MoveWindowAndGo', direction: 'Right' });

        expect(wm.calls).toEqual([
            { method: 'moveWindowToWorkspace', workspaceId: 4 },
            { method: 'switchWorkspace', monitor: 'DP-1', workspaceId: 3 },
            { method: 'switchWorkspace', monitor: 'DP-2', workspaceId: 4 },
        ]);
    });

    it('falls back to the first monitor when focus is unknown', async () => {
        wm.active = null;

        await run({ type: 'MoveWindowAndGo', direction: 'Down' });

        expect(wm.calls).toEqual([
            { method: 'moveWindowToWorkspace', workspaceId: 3 },
            { method: 'switchWorkspace', monitor: 'DP-1', workspaceId: 3 },
            { method: 'switchWorkspace', monitor: 'DP-2', workspaceId: 4 },
        ]);
    });

    it('uses the cell id directly with a single monitor', async () => {
        wm.layout = wm.layout.slice(0, 1);

        await run({ type: 'Go', direction: 'Right' }, { type: 'Go', direction: 'Down' });

        expect(wm.calls).toEqual([
            { method: 'switchWorkspace', monitor: 'DP-1', workspaceId: 2 },
            { method: 'switchWorkspace', monitor: 'DP-1', workspaceId: 3 },
        ]);
    });

    it('keeps the monitor set read on first use', async () => {
        await run({ type: 'Go', direction: 'Right' });
        wm.layout = [...wm.layout, { index: 2, name: 'HDMI-A-1', x: 3840, y: 0, width: 1920, height: 1080 }];
        wm.calls.length = 0;

        await run({ type: 'Go', direction: 'Right' });

        expect(wm.calls).toEqual(showsCell(3));
    });

    it('fails with BACKEND_FAILED when no monitors are reported', async () => {
        wm.layout = [];

        const [result] = await run({ type: 'Go', direction: 'Right' });

        expect(errorCode(result)).toBe('BACKEND_FAILED');
        expect(wm.calls).toEqual([]);
        expect(switcher.position).toEqual({ x: 1, y: 0 });
    });
});

// ============================================================================
// Monitors
// ============================================================================

describe('GridSwitcher monitors', () => {
    beforeEach(() => build());

    it('moves the focused window to the monitor in a direction', async () => {
        const [result] = await run({ type: 'MoveWindowToMonitor', direction: 'Right' });

        expect(result).toEqual({ ok: true });
        expect(wm.calls).toEqual([{ method: 'moveWindowToMonitor', monitor: 'DP-2' }]);
    });

    it('fails with NO_MONITOR_IN_DIRECTION and makes no backend call', async () => {
        const [result] = await run({ type: 'MoveWindowToMonitor', direction: 'Left' });

        expect(errorCode(result)).toBe('NO_MONITOR_IN_DIRECTION');
        expect(wm.calls).toEqual([]);
    });

    it('does nothing when no window has focus', async () => {
        wm.focused = null;

        const [result] = await run({ type: 'MoveWindowToMonitor', direction: 'Right' });

        expect(result).toEqual({ ok: true });
        expect(wm.calls).toEqual([]);
    });

    it('moves by index', async () => {
        await run({ type: 'MoveWindowToMonitorIndex', index: 1 });
        expect(wm.calls).toEqual([{ method: 'moveWindowToMonitor', monitor: 'DP-2' }]);
    });

    it('fails with OUT_OF_RANGE for an index equal to the monitor count', async () => {
        const [result] = await run({ type: 'MoveWindowToMonitorIndex', index: 2 });

        expect(errorCode(result)).toBe('OUT_OF_RANGE');
        expect(wm.calls).toEqual([]);
        expect(switcher.position).toEqual({ x: 0, y: 0 });
    });
});

// ============================================================================
// Swipe gestures
// ============================================================================

describe('GridSwitcher swipes', () => {
    it('cancels a swipe released below the commit threshold', async () => {
        build();

        await run(
            { type: 'SwipeBegin', fingers: 3 },
            { type: 'SwipeUpdate', fingers: 3, dx: 50, dy: 0 },
            { type: 'SwipeEnd' },
        );

        expect(wm.calls).toEqual([]);
        expect(switcher.position).toEqual({ x: 0, y: 0 });
        expect(switcher.gestureState).toEqual({ kind: 'idle' });
        expect(sink.events).toEqual([
            { type: 'gesture-preview', progress: 0.25, direction: 'Right', offsetX: 0.25, offsetY: 0, target: null },
            { type: 'gesture-end', committed: false },
            {
                type: 'position-changed',
                position: { x: 0, y: 0 },
                workspaceId: 1,
                visited: [{ x: 0, y: 0 }],
                dimensions: { minX: 0, minY: 0, maxX: 0, maxY: 0, cols: 1, rows: 1 },
            },
        ]);
    });

    it('commits a swipe released at or past the commit threshold', async () => {
        build();

        await run(
            { type: 'SwipeBegin', fingers: 3 },
            { type: 'SwipeUpdate', fingers: 3, dx: 50, dy: 0 },
            { type: 'SwipeUpdate', fingers: 3, dx: 20, dy: 0 },
            { type: 'SwipeEnd' },
        );

        expect(wm.calls).toEqual(showsCell(2));
        expect(switcher.position).toEqual({ x: 1, y: 0 });
        expect(sink.types()).toEqual(['gesture-preview', 'gesture-preview', 'gesture-end', 'position-changed']);
        expect(sink.events[1]).toMatchObject({ type: 'gesture-preview', direction: 'Right', target: { x: 1, y: 0 } });
        expect(sink.events[2]).toEqual({ type: 'gesture-end', committed: true });
    });

    it('carries the window for move-finger swipes', async () => {
        build();

        await run(
            { type: 'SwipeBegin', fingers: 4 },
            { type: 'SwipeUpdate', fingers: 4, dx: 0, dy: 100 },
            { type: 'SwipeEnd' },
        );

        expect(switcher.position).toEqual({ x: 0, y: 1 });
        expect(wm.calls).toEqual([
            { method: 'moveWindowToWorkspace', workspaceId: 3 },
            ...showsCell(2),
        ]);
    });

    it('keeps the begin-time carry decision when the finger count drifts', async () => {
        build();

        await run(
            { type: 'SwipeBegin', fingers: 3 },
            { type: 'SwipeUpdate', fingers: 4, dx: 100, dy: 0 },
            { type: 'SwipeEnd' },
        );

        expect(switcher.position).toEqual({ x: 1, y: 0 });
        expect(wm.calls).toEqual(showsCell(2));
    });

    it('commits mid-drag once the drag threshold is reached', async () => {
        build({ ...PLAIN_SWIPES, sensitivity: 100, commitWhileDraggingThreshold: 0.8 });

        await run(
            { type: 'SwipeBegin', fingers: 3 },
            { type: 'SwipeUpdate', fingers: 3, dx: 85, dy: 0 },
        );

        expect(wm.calls).toEqual(showsCell(2));
        expect(switcher.gestureState).toEqual({ kind: 'idle' });

        await run({ type: 'SwipeEnd' });
        expect(wm.calls).toHaveLength(2);
    });

    it('inverts direction under natural swiping', async () => {
        build({ ...DEFAULT_GESTURE_CONFIG, naturalSwiping: true });

        await run(
            { type: 'SwipeBegin', fingers: 3 },
            { type: 'SwipeUpdate', fingers: 3, dx: -100, dy: 0 },
            { type: 'SwipeEnd' },
        );

        expect(switcher.position).toEqual({ x: 1, y: 0 });
    });

    it('ignores swipes with an unconfigured finger count', async () => {
        build();

        await run(
            { type: 'SwipeBegin', fingers: 2 },
            { type: 'SwipeUpdate', fingers: 2, dx: 500, dy: 0 },
            { type: 'SwipeEnd' },
        );

        expect(wm.calls).toEqual([]);
        expect(sink.events).toEqual([]);
    });

    it('ignores stray gesture events while idle', async () => {
        build();

        const results = await run(
            { type: 'SwipeUpdate', fingers: 3, dx: 500, dy: 0 },
            { type: 'SwipeEnd' },
            { type: 'CancelMove' },
        );

        expect(results.every(r => r.ok)).toBe(true);
        expect(wm.calls).toEqual([]);
        expect(sink.events).toEqual([]);
    });

    it('replaces an open preview on a new SwipeBegin', async () => {
        build();

        await run(
            { type: 'SwipeBegin', fingers: 3 },
            { type: 'SwipeUpdate', fingers: 3, dx: 50, dy: 0 },
            { type: 'SwipeBegin', fingers: 4 },
            { type: 'SwipeUpdate', fingers: 4, dx: 20, dy: 0 },
        );

        expect(switcher.gestureState).toEqual({
            kind: 'previewing',
            accumulatedDx: 0.1,
            accumulatedDy: 0,
            fingers: 4,
            carriesWindow: true,
        });

        await run({ type: 'SwipeEnd' });
        expect(wm.calls).toEqual([]);
    });
});

// ============================================================================
// Discrete gestures
// ============================================================================

describe('GridSwitcher prepare / commit', () => {
    beforeEach(() => build());

    it('PrepareMove opens a preview without moving', async () => {
        await run({ type: 'PrepareMove', dx: 100, dy: 0 });

        expect(switcher.position).toEqual({ x: 0, y: 0 });
        expect(switcher.snapshot().gesture).toEqual({
            state: 'previewing',
            offsetX: 0.5,
            offsetY: 0,
            fingers: null,
            carriesWindow: false,
        });
        expect(wm.calls).toEqual([]);
    });

    it('CommitMove takes its direction from the command once past the threshold', async () => {
        await run({ type: 'PrepareMove', dx: 100, dy: 0 }, { type: 'CommitMove', direction: 'Down' });

        expect(switcher.position).toEqual({ x: 0, y: 1 });
        expect(wm.calls).toEqual(showsCell(2));
        expect(switcher.gestureState).toEqual({ kind: 'idle' });
    });

    it('CommitMove below the threshold snaps back', async () => {
        await run({ type: 'PrepareMove', dx: 20, dy: 0 }, { type: 'CommitMove', direction: 'Right' });

        expect(switcher.position).toEqual({ x: 0, y: 0 });
        expect(wm.calls).toEqual([]);
        expect(sink.types()).toEqual(['gesture-preview', 'gesture-end', 'position-changed']);
    });

    it('CancelMove discards the preview', async () => {
        await run({ type: 'PrepareMove', dx: 150, dy: 0 }, { type: 'CancelMove' });

        expect(switcher.position).toEqual({ x: 0, y: 0 });
        expect(switcher.gestureState).toEqual({ kind: 'idle' });
        expect(wm.calls).toEqual([]);
    });

    it('CommitMove without a preview behaves like Go', async () => {
        await run({ type: 'CommitMove', direction: 'Right' });

        expect(switcher.position).toEqual({ x: 1, y: 0 });
        expect(wm.calls).toEqual(showsCell(2));
    });

    it('marks the preview target visited without allocating it', async () => {
        await run({ type: 'PrepareMove', dx: 0, dy: 80 });

        const snapshot = switcher.snapshot();
        expect(snapshot.visited).toEqual([{ x: 0, y: 0 }, { x: 0, y: 1 }]);
        expect(snapshot.workspaceId).toBe(1);
    });
});

// ============================================================================
// Visualizer
// ============================================================================

describe('GridSwitcher visualizer', () => {
    it('ToggleVisualizer flips the pinned flag', async () => {
        build();

        await run({ type: 'ToggleVisualizer' }, { type: 'ToggleVisualizer' });

        expect(switcher.isPinned).toBe(false);
        expect(sink.events).toEqual([
            { type: 'visualizer-toggled', pinned: true },
            { type: 'visualizer-toggled', pinned: false },
        ]);
    });

    it('a failing visualizer does not fail the command', async () => {
        const failing = { publish: vi.fn(() => { throw new Error('overlay gone'); }) };
        const localWm = new FakeWindowManager();
        const local = new GridSwitcher(localWm, { gestures: PLAIN_SWIPES, visualizer: failing });

        const result = await local.handle({ type: 'Go', direction: 'Right' });

        expect(result).toEqual({ ok: true });
        expect(failing.publish).toHaveBeenCalledTimes(1);
    });

    it('works without a visualizer', async () => {
        const local = new GridSwitcher(new FakeWindowManager());
        expect(await local.handle({ type: 'ToggleVisualizer' })).toEqual({ ok: true });
        expect(local.isPinned).toBe(true);
    });
});
