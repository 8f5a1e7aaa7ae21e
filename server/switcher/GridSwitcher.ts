/**
 * GridSwitcher
 *
 * Central command handler. Owns the Grid and the open gesture, turns each
 * Command into window-manager calls and publishes visualizer notifications.
 *
 * Commands must be handed in one at a time (see CommandQueue); the class
 * itself is written as if single-threaded.
 *
 * Every grid cell is shown on all monitors at once: each monitor gets its
 * own workspace for the cell (monitorWorkspaceId). The monitor set is read
 * from the backend on first use and kept, since the ids depend on its size.
 *
 * Backend calls are best-effort: when the window manager fails after the
 * grid has moved, the grid keeps its new position and the failure comes
 * back as a CommandResult. The next navigation re-issues a switch for
 * whatever cell is current, which brings the compositor back in line.
 *
 * @module server/switcher/GridSwitcher
 */

import logger from '../utils/logger';
import type { Command, CommandOf, Direction, GridCoordinate } from '../../shared/types/command';
import type { GestureSnapshot, SwitcherSnapshot, VisualizerEvent } from '../../shared/types/visualizer';
import { Grid, monitorWorkspaceId, WorkspaceId } from '../grid/Grid';
import { unitVector } from '../grid/direction';
import type { WindowManager } from '../wm/types';
import { BackendError, extractErrorMessage } from '../wm/errors';
import type { VisualizerSink } from '../services/visualizerBroadcaster';
import { findMonitorIndexByName, resolveByDirection, resolveByIndex } from '../monitors/resolver';
import {
    accumulate,
    clampUnit,
    directionAtThreshold,
    dominantAxis,
    evaluateRelease,
    evaluateWhileDragging,
    GestureDecision,
    openPreview,
    routeSwipe,
} from '../gestures/accumulator';
import { DEFAULT_GESTURE_CONFIG, GestureConfig, GestureState, IDLE, PreviewingState } from '../gestures/types';
import { CommandResult, failed, OK } from './errors';

// ============================================================================
// TYPES
// ============================================================================

export interface GridSwitcherOptions {
    gestures?: GestureConfig;
    visualizer?: VisualizerSink;
}

interface MonitorTarget {
    name: string;
    workspaceId: WorkspaceId;
}

// ============================================================================
// GRID SWITCHER CLASS
// ============================================================================

export class GridSwitcher {
    private readonly grid = new Grid();
    private readonly gestureConfig: GestureConfig;
    private readonly visualizer: VisualizerSink | null;
    private gesture: GestureState = IDLE;
    private pinned = false;
    private monitorNames: string[] | null = null;

    constructor(private readonly wm: WindowManager, options: GridSwitcherOptions = {}) {
        this.gestureConfig = options.gestures ?? { ...DEFAULT_GESTURE_CONFIG };
        this.visualizer = options.visualizer ?? null;
    }

    /**
     * Process a single command end to end.
     * Never throws; failures come back as `{ ok: false }`.
     */
    async handle(command: Command): Promise<CommandResult> {
        try {
            await this.dispatch(command);
            return OK;
        } catch (error) {
            const result = failed(command, error);
            logger.warn(`[Switcher] Command failed: code=${result.error.code} error="${result.error.message}"`);
            return result;
        }
    }

    get position(): GridCoordinate {
        return this.grid.position;
    }

    get gestureState(): GestureState {
        return this.gesture;
    }

    get isPinned(): boolean {
        return this.pinned;
    }

    snapshot(): SwitcherSnapshot {
        return {
            position: this.grid.position,
            workspaceId: this.grid.currentWorkspaceId,
            dimensions: this.grid.dimensions(),
            visited: this.grid.visitedCells(),
            gesture: this.gestureSnapshot(),
            pinned: this.pinned,
        };
    }

    // ========================================================================
    // DISPATCH
    // ========================================================================

    private async dispatch(command: Command): Promise<void> {
        switch (command.type) {
            case 'Go':
                logger.info(`[Switcher] Go: direction=${command.direction}`);
                return this.navigate(command.direction, false);

            case 'MoveWindowAndGo':
                logger.info(`[Switcher] Move window and go: direction=${command.direction}`);
                return this.navigate(command.direction, true);

            case 'SwitchTo':
                return this.switchTo(command);

            case 'MoveWindowToMonitor':
                return this.moveWindowToMonitor(command);

            case 'MoveWindowToMonitorIndex':
                return this.moveWindowToMonitorIndex(command);

            case 'PrepareMove':
                return this.prepareMove(command);

            case 'CancelMove':
                return this.cancelMove();

            case 'CommitMove':
                return this.commitMove(command);

            case 'SwipeBegin':
                return this.swipeBegin(command);

            case 'SwipeUpdate':
                return this.swipeUpdate(command);

            case 'SwipeEnd':
                return this.swipeEnd();

            case 'ToggleVisualizer':
                this.pinned = !this.pinned;
                logger.debug(`[Switcher] Visualizer toggled: pinned=${this.pinned}`);
                this.publish({ type: 'visualizer-toggled', pinned: this.pinned });
                return;
        }
    }

    // ========================================================================
    // NAVIGATION
    // ========================================================================

    /**
     * Step one cell, optionally carrying the focused window along.
     * The grid moves first; position is published even when the backend fails.
     */
    private async navigate(direction: Direction, carriesWindow: boolean): Promise<void> {
        const { coord, workspaceId } = this.grid.moveBy(unitVector(direction));
        logger.debug(`[Switcher] Position: x=${coord.x} y=${coord.y} cell=${workspaceId} carriesWindow=${carriesWindow}`);

        try {
            await this.showCell(workspaceId, carriesWindow);
        } finally {
            this.publishPosition();
        }
    }

    private async switchTo(command: CommandOf<'SwitchTo'>): Promise<void> {
        const workspaceId = this.grid.setCurrent({ x: command.x, y: command.y });
        logger.info(`[Switcher] Switch to: x=${command.x} y=${command.y} cell=${workspaceId}`);

        try {
            await this.showCell(workspaceId, false);
        } finally {
            this.publishPosition();
        }
    }

    /**
     * Switch every monitor to its workspace for `cellId`, optionally sending
     * the focused window ahead to the focused monitor's one. The focused
     * monitor is switched last so focus stays where it was.
     */
    private async showCell(cellId: WorkspaceId, carriesWindow: boolean): Promise<void> {
        const names = await this.monitorSet();
        const targets: MonitorTarget[] = names.map((name, index) => ({
            name,
            workspaceId: monitorWorkspaceId(cellId, index, names.length),
        }));

        const active = await this.wm.activeMonitor();
        const focused = targets.find(t => t.name === active) ?? null;

        if (carriesWindow) {
            const destination = focused ?? targets[0];
            if (!focused) {
                logger.warn(`[Switcher] Focused monitor unknown, moving window to ${destination.name}: active=${active ?? '-'}`);
            }
            await this.wm.moveWindowToWorkspace(destination.workspaceId);
        }

        const ordered = focused ? [...targets.filter(t => t !== focused), focused] : targets;
        for (const target of ordered) {
            await this.wm.switchWorkspace(target.name, target.workspaceId);
        }
    }

    /**
     * Monitor names in backend order, read once. A monitor connected later
     * is not switched.
     */
    private async monitorSet(): Promise<string[]> {
        if (this.monitorNames) return this.monitorNames;

        const layout = await this.wm.monitors();
        if (layout.length === 0) {
            throw new BackendError('PARSE_FAILED', 'Window manager reported no monitors');
        }
        this.monitorNames = layout.map(m => m.name);
        logger.info(`[Switcher] Monitors: ${this.monitorNames.join(',')}`);
        return this.monitorNames;
    }

    // ========================================================================
    // MONITORS
    // ========================================================================

    private async moveWindowToMonitor(command: CommandOf<'MoveWindowToMonitor'>): Promise<void> {
        const window = await this.wm.activeWindow();
        if (!window) {
            logger.debug('[Switcher] No focused window, nothing to move');
            return;
        }

        const layout = await this.wm.monitors();
        const referenceIndex = findMonitorIndexByName(layout, window.monitor);
        const target = resolveByDirection(layout, referenceIndex, command.direction);

        logger.info(`[Switcher] Move window to monitor: direction=${command.direction} from=${window.monitor} to=${target.name}`);
        await this.wm.moveWindowToMonitor(target.name);
    }

    private async moveWindowToMonitorIndex(command: CommandOf<'MoveWindowToMonitorIndex'>): Promise<void> {
        const layout = await this.wm.monitors();
        const target = resolveByIndex(layout, command.index);

        logger.info(`[Switcher] Move window to monitor: index=${command.index} to=${target.name}`);
        await this.wm.moveWindowToMonitor(target.name);
    }

    // ========================================================================
    // GESTURES
    // ========================================================================

    private prepareMove(command: CommandOf<'PrepareMove'>): void {
        const state = this.gesture.kind === 'previewing'
            ? this.gesture
            : openPreview(null, false);

        this.gesture = accumulate(state, command.dx, command.dy, this.gestureConfig);
        this.publishPreview(this.gesture);
    }

    private async cancelMove(): Promise<void> {
        if (this.gesture.kind === 'idle') return;
        return this.finishGesture({ action: 'cancel' });
    }

    private async commitMove(command: CommandOf<'CommitMove'>): Promise<void> {
        if (this.gesture.kind === 'idle') {
            logger.info(`[Switcher] Commit without preview: direction=${command.direction}`);
            return this.navigate(command.direction, false);
        }

        const decision = evaluateRelease(this.gesture, this.gestureConfig, command.direction);
        return this.finishGesture(decision);
    }

    private swipeBegin(command: CommandOf<'SwipeBegin'>): void {
        const route = routeSwipe(command.fingers, this.gestureConfig);
        if (!route) {
            logger.debug(`[Switcher] Ignoring swipe: fingers=${command.fingers}`);
            return;
        }

        logger.debug(`[Switcher] Swipe begin: fingers=${command.fingers} carriesWindow=${route.carriesWindow}`);
        this.gesture = openPreview(command.fingers, route.carriesWindow);
    }

    private async swipeUpdate(command: CommandOf<'SwipeUpdate'>): Promise<void> {
        if (this.gesture.kind === 'idle') return;

        const state = accumulate(this.gesture, command.dx, command.dy, this.gestureConfig);
        this.gesture = state;
        this.publishPreview(state);

        const decision = evaluateWhileDragging(state, this.gestureConfig);
        if (decision) {
            logger.debug('[Switcher] Drag threshold reached');
            await this.finishGesture(decision);
        }
    }

    private async swipeEnd(): Promise<void> {
        if (this.gesture.kind === 'idle') return;

        const decision = evaluateRelease(this.gesture, this.gestureConfig);
        return this.finishGesture(decision);
    }

    /**
     * Close the open gesture and act on the decision. The gesture is
     * cleared before any backend call so a failure cannot leave it open.
     */
    private async finishGesture(decision: GestureDecision): Promise<void> {
        this.gesture = IDLE;

        if (decision.action === 'cancel') {
            logger.debug('[Switcher] Gesture cancelled, snapping back');
            this.publish({ type: 'gesture-end', committed: false });
            this.publishPosition();
            return;
        }

        logger.info(`[Switcher] Gesture commit: direction=${decision.direction} carriesWindow=${decision.carriesWindow}`);
        this.publish({ type: 'gesture-end', committed: true });
        await this.navigate(decision.direction, decision.carriesWindow);
    }

    // ========================================================================
    // VISUALIZER
    // ========================================================================

    private publish(event: VisualizerEvent): void {
        if (!this.visualizer) return;
        try {
            this.visualizer.publish(event);
        } catch (error) {
            logger.error(`[Switcher] Visualizer publish failed: type=${event.type} error="${extractErrorMessage(error)}"`);
        }
    }

    private publishPosition(): void {
        this.publish({
            type: 'position-changed',
            position: this.grid.position,
            workspaceId: this.grid.currentWorkspaceId,
            visited: this.grid.visitedCells(),
            dimensions: this.grid.dimensions(),
        });
    }

    private publishPreview(state: PreviewingState): void {
        const dominant = dominantAxis(state);
        const committable = directionAtThreshold(state, this.gestureConfig.commitThreshold);
        const target = committable ? this.grid.neighbor(committable) : null;
        if (target) {
            this.grid.markVisited(target);
        }

        logger.debug(`[Switcher] Preview: dx=${state.accumulatedDx.toFixed(2)} dy=${state.accumulatedDy.toFixed(2)} direction=${dominant.direction ?? '-'}`);
        this.publish({
            type: 'gesture-preview',
            progress: dominant.progress,
            direction: dominant.direction,
            offsetX: clampUnit(state.accumulatedDx),
            offsetY: clampUnit(state.accumulatedDy),
            target,
        });
    }

    private gestureSnapshot(): GestureSnapshot {
        if (this.gesture.kind === 'idle') {
            return { state: 'idle' };
        }
        return {
            state: 'previewing',
            offsetX: this.gesture.accumulatedDx,
            offsetY: this.gesture.accumulatedDy,
            fingers: this.gesture.fingers,
            carriesWindow: this.gesture.carriesWindow,
        };
    }
}
