/**
 * Command Types
 * Shared between the daemon (switcher, transports) and command clients (gridctl, plugin forwarder)
 */

/**
 * Cardinal navigation direction
 */
export type Direction = 'Left' | 'Right' | 'Up' | 'Down';

export const DIRECTIONS: readonly Direction[] = ['Left', 'Right', 'Up', 'Down'];

/**
 * A (column, row) cell in the workspace grid
 */
export interface GridCoordinate {
    x: number;
    y: number;
}

/**
 * Every action the switcher can perform.
 * `dx`/`dy` on PrepareMove and SwipeUpdate are raw pixel deltas.
 */
export type Command =
    | { type: 'Go'; direction: Direction }
    | { type: 'SwitchTo'; x: number; y: number }
    | { type: 'MoveWindowAndGo'; direction: Direction }
    | { type: 'MoveWindowToMonitor'; direction: Direction }
    | { type: 'MoveWindowToMonitorIndex'; index: number }
    | { type: 'PrepareMove'; dx: number; dy: number }
    | { type: 'CancelMove' }
    | { type: 'CommitMove'; direction: Direction }
    | { type: 'SwipeBegin'; fingers: number }
    | { type: 'SwipeUpdate'; fingers: number; dx: number; dy: number }
    | { type: 'SwipeEnd' }
    | { type: 'ToggleVisualizer' };

export type CommandType = Command['type'];

/**
 * Narrow a command union member by its tag
 */
export type CommandOf<T extends CommandType> = Extract<Command, { type: T }>;

export function isDirection(value: unknown): value is Direction {
    return DIRECTIONS.some(d => d === value);
}

/**
 * Short human-readable rendering for log lines
 */
export function describeCommand(command: Command): string {
    switch (command.type) {
        case 'Go':
        case 'MoveWindowAndGo':
        case 'MoveWindowToMonitor':
        case 'CommitMove':
            return `${command.type}(${command.direction})`;
        case 'SwitchTo':
            return `SwitchTo(${command.x},${command.y})`;
        case 'MoveWindowToMonitorIndex':
            return `MoveWindowToMonitorIndex(${command.index})`;
        case 'PrepareMove':
            return `PrepareMove(dx=${command.dx} dy=${command.dy})`;
        case 'SwipeBegin':
            return `SwipeBegin(fingers=${command.fingers})`;
        case 'SwipeUpdate':
            return `SwipeUpdate(fingers=${command.fingers} dx=${command.dx} dy=${command.dy})`;
        case 'CancelMove':
        case 'SwipeEnd':
        case 'ToggleVisualizer':
            return command.type;
    }
}
