/**
 * Monitor Resolver
 *
 * Picks the target monitor for MoveWindowToMonitor / MoveWindowToMonitorIndex
 * from a live layout. Direction lookup is a nearest-neighbour search in the
 * half-plane on the requested side of the reference monitor's centre:
 * monitor arrangements are user-configured and rarely a clean row/column.
 *
 * All functions are pure; the layout is never cached.
 *
 * @module server/monitors/resolver
 */

import type { Direction } from '../../shared/types/command';
import type { MonitorInfo } from '../wm/types';
import { isHorizontal } from '../grid/direction';

// ============================================================================
// ERRORS
// ============================================================================

export type ResolutionErrorCode =
    | 'OUT_OF_RANGE'
    | 'NO_MONITOR_IN_DIRECTION'
    | 'UNKNOWN_MONITOR';

export class ResolutionError extends Error {
    public readonly name = 'ResolutionError';

    constructor(
        public readonly code: ResolutionErrorCode,
        message: string,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
    }
}

// ============================================================================
// TYPES
// ============================================================================

interface Point {
    x: number;
    y: number;
}

function centerOf(monitor: MonitorInfo): Point {
    return {
        x: monitor.x + monitor.width / 2,
        y: monitor.y + monitor.height / 2,
    };
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Position of the named monitor within the layout.
 * @throws ResolutionError UNKNOWN_MONITOR
 */
export function findMonitorIndexByName(layout: readonly MonitorInfo[], name: string): number {
    const index = layout.findIndex(m => m.name === name);
    if (index === -1) {
        throw new ResolutionError('UNKNOWN_MONITOR',
            `Monitor ${name} is not in the current layout`,
            { name, monitors: layout.map(m => m.name) }
        );
    }
    return index;
}

/**
 * Monitor at `index` (position in `layout`).
 * @throws ResolutionError OUT_OF_RANGE
 */
export function resolveByIndex(layout: readonly MonitorInfo[], index: number): MonitorInfo {
    if (!Number.isInteger(index) || index < 0 || index >= layout.length) {
        throw new ResolutionError('OUT_OF_RANGE',
            `Monitor index ${index} out of range (have ${layout.length})`,
            { index, count: layout.length }
        );
    }
    return layout[index];
}

/**
 * Closest monitor strictly on the `direction` side of the reference monitor.
 * Candidates are ranked by perpendicular offset first, then by distance
 * along the axis.
 *
 * @throws ResolutionError OUT_OF_RANGE when the reference index is invalid,
 *         NO_MONITOR_IN_DIRECTION when nothing lies on that side
 */
export function resolveByDirection(
    layout: readonly MonitorInfo[],
    referenceIndex: number,
    direction: Direction
): MonitorInfo {
    const reference = resolveByIndex(layout, referenceIndex);
    const origin = centerOf(reference);
    const horizontal = isHorizontal(direction);
    const sign = direction === 'Right' || direction === 'Down' ? 1 : -1;

    let best: { monitor: MonitorInfo; perpendicular: number; along: number } | null = null;

    for (let index = 0; index < layout.length; index++) {
        if (index === referenceIndex) continue;

        const monitor = layout[index];
        const center = centerOf(monitor);
        const alongDelta = horizontal ? center.x - origin.x : center.y - origin.y;
        if (alongDelta * sign <= 0) continue;

        const perpendicular = Math.abs(horizontal ? center.y - origin.y : center.x - origin.x);
        const along = Math.abs(alongDelta);

        if (
            best === null
            || perpendicular < best.perpendicular
            || (perpendicular === best.perpendicular && along < best.along)
        ) {
            best = { monitor, perpendicular, along };
        }
    }

    if (best === null) {
        throw new ResolutionError('NO_MONITOR_IN_DIRECTION',
            `No monitor ${direction.toLowerCase()} of ${reference.name}`,
            { direction, reference: reference.name }
        );
    }
    return best.monitor;
}
