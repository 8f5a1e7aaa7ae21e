/**
 * Gesture Types
 */

export interface GestureConfig {
    /** Pixels of finger travel per grid cell */
    sensitivity: number;
    /** Normalised distance needed at release to commit, in (0, 1] */
    commitThreshold: number;
    /** Commit mid-drag once this distance is reached; null = release only */
    commitWhileDraggingThreshold: number | null;
    /** Finger count for a plain switch swipe */
    switchFingers: number;
    /** Finger count for a move-window-and-switch swipe */
    moveFingers: number;
    /** Invert both axes (swipe right moves the grid left) */
    naturalSwiping: boolean;
}

export const DEFAULT_GESTURE_CONFIG: Readonly<GestureConfig> = {
    sensitivity: 200,
    commitThreshold: 0.3,
    commitWhileDraggingThreshold: null,
    switchFingers: 3,
    moveFingers: 4,
    naturalSwiping: true,
};

/**
 * An open gesture. `fingers` is null when opened by PrepareMove.
 */
export interface PreviewingState {
    readonly kind: 'previewing';
    readonly accumulatedDx: number;
    readonly accumulatedDy: number;
    readonly fingers: number | null;
    readonly carriesWindow: boolean;
}

export interface IdleState {
    readonly kind: 'idle';
}

export type GestureState = IdleState | PreviewingState;

export const IDLE: IdleState = { kind: 'idle' };
