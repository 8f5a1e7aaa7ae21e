/**
 * Workspace Grid
 *
 * Maps an unbounded, sparse 2-D coordinate space onto window-manager
 * workspace ids. Cells are allocated lazily: the first visit draws the next
 * id from a counter, every later visit returns the same id, so windows stay
 * where they were left. Ids are never reclaimed.
 *
 * Each cell owns one id per monitor (see monitorWorkspaceId); the grid
 * itself only hands out the cell's id.
 *
 * Coordinates never go negative. The grid grows right and down without
 * bound; a step Left or Up at column or row 0 stays where it is.
 *
 * @module server/grid/Grid
 */

import type { Direction, GridCoordinate } from '../../shared/types/command';
import type { GridDimensions } from '../../shared/types/visualizer';
import { offset, unitVector } from './direction';

// ============================================================================
// TYPES
// ============================================================================

/** Opaque, orderable workspace identifier understood by the backend */
export type WorkspaceId = number;

export interface GridMove {
    coord: GridCoordinate;
    workspaceId: WorkspaceId;
}

/** Compositors number workspaces from 1 */
export const FIRST_WORKSPACE_ID: WorkspaceId = 1;

function keyOf(coord: GridCoordinate): string {
    return `${coord.x},${coord.y}`;
}

function clampToOrigin(coord: GridCoordinate): GridCoordinate {
    return { x: Math.max(0, coord.x), y: Math.max(0, coord.y) };
}

/**
 * Compositor workspace for cell `cellId` on the monitor at `monitorIndex`.
 * Cells own contiguous blocks of `monitorCount` ids, so with a single
 * monitor this is the cell id itself.
 */
export function monitorWorkspaceId(cellId: WorkspaceId, monitorIndex: number, monitorCount: number): WorkspaceId {
    return (cellId - FIRST_WORKSPACE_ID) * monitorCount + monitorIndex + FIRST_WORKSPACE_ID;
}

// ============================================================================
// GRID
// ============================================================================

export class Grid {
    private current: GridCoordinate = { x: 0, y: 0 };
    private readonly allocated: Map<string, WorkspaceId> = new Map();
    private readonly visited: Map<string, GridCoordinate> = new Map();
    private nextId: WorkspaceId = FIRST_WORKSPACE_ID;

    constructor() {
        this.resolve(this.current);
    }

    /**
     * Identifier for `coord`, allocating one on first visit.
     */
    resolve(coord: GridCoordinate): WorkspaceId {
        const key = keyOf(coord);
        const existing = this.allocated.get(key);
        if (existing !== undefined) {
            return existing;
        }

        const id = this.nextId++;
        this.allocated.set(key, id);
        this.visited.set(key, { x: coord.x, y: coord.y });
        return id;
    }

    /**
     * Identifier for `coord` without allocating.
     */
    peek(coord: GridCoordinate): WorkspaceId | undefined {
        return this.allocated.get(keyOf(coord));
    }

    /**
     * Step the cursor by `delta` and resolve the destination. Steps past
     * the origin are clamped to it.
     */
    moveBy(delta: GridCoordinate): GridMove {
        const coord = clampToOrigin(offset(this.current, delta));
        const workspaceId = this.resolve(coord);
        this.current = coord;
        return { coord: { ...coord }, workspaceId };
    }

    /**
     * Absolute jump.
     * @throws RangeError for a negative coordinate
     */
    setCurrent(coord: GridCoordinate): WorkspaceId {
        if (coord.x < 0 || coord.y < 0) {
            throw new RangeError(`Grid coordinates must be non-negative, got (${coord.x},${coord.y})`);
        }
        const workspaceId = this.resolve(coord);
        this.current = { x: coord.x, y: coord.y };
        return workspaceId;
    }

    /**
     * Record a cell the user passed through without making it current
     * (gesture preview). Does not allocate an id.
     */
    markVisited(coord: GridCoordinate): void {
        const key = keyOf(coord);
        if (!this.visited.has(key)) {
            this.visited.set(key, { x: coord.x, y: coord.y });
        }
    }

    /**
     * Target cell one step away from the cursor. Pure.
     */
    neighbor(direction: Direction): GridCoordinate {
        return clampToOrigin(offset(this.current, unitVector(direction)));
    }

    get position(): GridCoordinate {
        return { ...this.current };
    }

    get currentWorkspaceId(): WorkspaceId {
        return this.resolve(this.current);
    }

    get allocatedCount(): number {
        return this.allocated.size;
    }

    /**
     * Visited cells, ordered by row then column.
     */
    visitedCells(): GridCoordinate[] {
        return Array.from(this.visited.values())
            .map(c => ({ x: c.x, y: c.y }))
            .sort((a, b) => a.y - b.y || a.x - b.x);
    }

    isVisited(coord: GridCoordinate): boolean {
        return this.visited.has(keyOf(coord));
    }

    /**
     * Bounding box of every visited cell (always contains the cursor).
     */
    dimensions(): GridDimensions {
        let minX = this.current.x;
        let maxX = this.current.x;
        let minY = this.current.y;
        let maxY = this.current.y;

        for (const { x, y } of this.visited.values()) {
            minX = Math.min(minX, x);
            maxX = Math.max(maxX, x);
            minY = Math.min(minY, y);
            maxY = Math.max(maxY, y);
        }

        return {
            minX,
            minY,
            maxX,
            maxY,
            cols: maxX - minX + 1,
            rows: maxY - minY + 1,
        };
    }
}
