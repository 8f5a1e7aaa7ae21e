import type { Direction, GridCoordinate } from '../../shared/types/command';

const UNIT_VECTORS: Record<Direction, GridCoordinate> = {
    Left: { x: -1, y: 0 },
    Right: { x: 1, y: 0 },
    Up: { x: 0, y: -1 },
    Down: { x: 0, y: 1 },
};

/**
 * Unit step for a direction. Screen convention: +y points down.
 */
export function unitVector(direction: Direction): GridCoordinate {
    const { x, y } = UNIT_VECTORS[direction];
    return { x, y };
}

export function isHorizontal(direction: Direction): boolean {
    return direction === 'Left' || direction === 'Right';
}

export function offset(coord: GridCoordinate, delta: GridCoordinate): GridCoordinate {
    return { x: coord.x + delta.x, y: coord.y + delta.y };
}
