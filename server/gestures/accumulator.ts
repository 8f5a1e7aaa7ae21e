/**
 * Gesture Accumulator
 *
 * Turns raw finger deltas into normalised progress and decides whether a
 * gesture commits. Discrete PrepareMove/CommitMove flows and continuous
 * swipes both feed the same functions, so thresholds and direction
 * inference behave identically for both.
 *
 * Everything here is pure: the open gesture lives in the switcher as a
 * PreviewingState value and each update returns a new one.
 *
 * @module server/gestures/accumulator
 */

import type { Direction } from '../../shared/types/command';
import type { GestureConfig, PreviewingState } from './types';

// ============================================================================
// TYPES
// ============================================================================

export interface DominantAxis {
    axis: 'x' | 'y';
    /** Absolute accumulated distance along the dominant axis */
    magnitude: number;
    /** Null when nothing has moved yet */
    direction: Direction | null;
    /** Signed dominant-axis value clamped to [-1, 1] */
    progress: number;
}

export type GestureDecision =
    | { action: 'commit'; direction: Direction; carriesWindow: boolean }
    | { action: 'cancel' };

// ============================================================================
// HELPERS
// ============================================================================

export function clampUnit(value: number): number {
    return Math.max(-1, Math.min(1, value));
}

/**
 * Pixel delta → grid-cell units, inverted under natural swiping.
 */
export function normalizeDelta(
    dx: number,
    dy: number,
    config: Pick<GestureConfig, 'sensitivity' | 'naturalSwiping'>
): { dx: number; dy: number } {
    const sign = config.naturalSwiping ? -1 : 1;
    return {
        dx: (sign * dx) / config.sensitivity,
        dy: (sign * dy) / config.sensitivity,
    };
}

// ============================================================================
// STATE TRANSITIONS
// ============================================================================

export function openPreview(fingers: number | null, carriesWindow: boolean): PreviewingState {
    return {
        kind: 'previewing',
        accumulatedDx: 0,
        accumulatedDy: 0,
        fingers,
        carriesWindow,
    };
}

/**
 * Decide how a swipe with `fingers` should be routed.
 * Returns null for finger counts that are not configured.
 */
export function routeSwipe(
    fingers: number,
    config: Pick<GestureConfig, 'switchFingers' | 'moveFingers'>
): { carriesWindow: boolean } | null {
    if (fingers === config.moveFingers) return { carriesWindow: true };
    if (fingers === config.switchFingers) return { carriesWindow: false };
    return null;
}

/**
 * Add a raw delta to the open gesture.
 */
export function accumulate(
    state: PreviewingState,
    dx: number,
    dy: number,
    config: Pick<GestureConfig, 'sensitivity' | 'naturalSwiping'>
): PreviewingState {
    const delta = normalizeDelta(dx, dy, config);
    return {
        ...state,
        accumulatedDx: state.accumulatedDx + delta.dx,
        accumulatedDy: state.accumulatedDy + delta.dy,
    };
}

// ============================================================================
// DIRECTION + COMMIT POLICY
// ============================================================================

/**
 * The axis with the larger absolute accumulation wins; ties go to x.
 */
export function dominantAxis(state: Pick<PreviewingState, 'accumulatedDx' | 'accumulatedDy'>): DominantAxis {
    const { accumulatedDx: dx, accumulatedDy: dy } = state;

    if (Math.abs(dx) >= Math.abs(dy)) {
        return {
            axis: 'x',
            magnitude: Math.abs(dx),
            direction: dx > 0 ? 'Right' : dx < 0 ? 'Left' : null,
            progress: clampUnit(dx),
        };
    }
    return {
        axis: 'y',
        magnitude: Math.abs(dy),
        direction: dy > 0 ? 'Down' : 'Up',
        progress: clampUnit(dy),
    };
}

/**
 * Candidate direction if the dominant magnitude reaches `threshold`.
 */
export function directionAtThreshold(state: PreviewingState, threshold: number): Direction | null {
    const { magnitude, direction } = dominantAxis(state);
    return magnitude >= threshold ? direction : null;
}

/**
 * Mid-drag check, run after every swipe update.
 * Returns null to keep dragging.
 */
export function evaluateWhileDragging(state: PreviewingState, config: GestureConfig): GestureDecision | null {
    if (config.commitWhileDraggingThreshold === null) return null;

    const direction = directionAtThreshold(state, config.commitWhileDraggingThreshold);
    if (direction === null) return null;

    return { action: 'commit', direction, carriesWindow: state.carriesWindow };
}

/**
 * Release check for SwipeEnd / CommitMove.
 * `override` replaces the inferred direction but not the threshold gate.
 */
export function evaluateRelease(
    state: PreviewingState,
    config: GestureConfig,
    override?: Direction
): GestureDecision {
    const direction = directionAtThreshold(state, config.commitThreshold);
    if (direction === null) {
        return { action: 'cancel' };
    }
    return {
        action: 'commit',
        direction: override ?? direction,
        carriesWindow: state.carriesWindow,
    };
}
