/**
 * Visualizer Types
 * Shared between the daemon (switcher, SSE stream) and the overlay that renders the grid
 */

import type { Direction, GridCoordinate } from './command';

/**
 * Bounding box of every visited cell
 */
export interface GridDimensions {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
    cols: number;
    rows: number;
}

export interface PositionChangedEvent {
    type: 'position-changed';
    position: GridCoordinate;
    /** Cell id; with several monitors each shows its own workspace for it */
    workspaceId: number;
    visited: GridCoordinate[];
    dimensions: GridDimensions;
}

export interface GesturePreviewEvent {
    type: 'gesture-preview';
    /** Signed dominant-axis progress, clamped to [-1, 1] */
    progress: number;
    direction: Direction | null;
    offsetX: number;
    offsetY: number;
    /** Cell the gesture would land on if released now (null below commit threshold) */
    target: GridCoordinate | null;
}

export interface GestureEndEvent {
    type: 'gesture-end';
    committed: boolean;
}

export interface VisualizerToggledEvent {
    type: 'visualizer-toggled';
    pinned: boolean;
}

export type VisualizerEvent =
    | PositionChangedEvent
    | GesturePreviewEvent
    | GestureEndEvent
    | VisualizerToggledEvent;

/**
 * Gesture section of a state snapshot
 */
export type GestureSnapshot =
    | { state: 'idle' }
    | {
        state: 'previewing';
        offsetX: number;
        offsetY: number;
        fingers: number | null;
        carriesWindow: boolean;
    };

/**
 * Full switcher state, sent as the first SSE event and served by GET /api/state
 */
export interface SwitcherSnapshot {
    position: GridCoordinate;
    /** Cell id; with several monitors each shows its own workspace for it */
    workspaceId: number;
    dimensions: GridDimensions;
    visited: GridCoordinate[];
    gesture: GestureSnapshot;
    pinned: boolean;
}
