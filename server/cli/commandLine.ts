/**
 * gridctl argument parsing
 *
 * Turns `gridctl <command> [args]` into a Command. Kept free of process and
 * socket access so it can be tested directly.
 */

import type { Command, Direction } from '../../shared/types/command';
import { DIRECTIONS } from '../../shared/types/command';
import { decodeCommand, WireFormatError } from '../ipc/wireFormat';

export class UsageError extends Error {
    public readonly name = 'UsageError';
}

export const USAGE = `
gridctl - send a command to the gridswitch daemon

Usage:
  gridctl <command> [args]

Commands:
  go <dir>                       Switch to the neighbouring workspace
  switch <x> <y>                 Switch to the workspace at column x, row y
  move <dir>                     Take the focused window along to the neighbour
  move-to-monitor <dir|index>    Send the focused window to another monitor
  toggle                         Pin or unpin the visualizer
  raw '<json>'                   Send one wire command verbatim

  <dir> is left, right, up or down (any case).

Environment:
  GRIDSWITCH_SOCKET    Daemon socket (default $XDG_RUNTIME_DIR/gridswitch.sock)

Examples:
  gridctl go right
  gridctl switch 2 1
  gridctl raw '{"PrepareMove":{"dx":0.4,"dy":0}}'
`;

function parseDirection(text: string | undefined): Direction | null {
    if (!text) return null;
    const lowered = text.toLowerCase();
    return DIRECTIONS.find(d => d.toLowerCase() === lowered) ?? null;
}

function requireDirection(command: string, text: string | undefined): Direction {
    const direction = parseDirection(text);
    if (!direction) {
        throw new UsageError(`${command} expects a direction (left|right|up|down), got ${text === undefined ? 'nothing' : `"${text}"`}`);
    }
    return direction;
}

function requireCoordinate(command: string, name: string, text: string | undefined): number {
    if (text === undefined || !/^\d+$/.test(text)) {
        throw new UsageError(`${command} expects a non-negative integer ${name}, got ${text === undefined ? 'nothing' : `"${text}"`}`);
    }
    return parseInt(text, 10);
}

function expectArgs(command: string, args: string[], count: number): void {
    if (args.length > count) {
        throw new UsageError(`${command}: unexpected argument "${args[count]}"`);
    }
}

/**
 * @throws UsageError
 */
export function buildCommand(argv: string[]): Command {
    if (argv.length === 0) {
        throw new UsageError('No command given');
    }
    const [name, ...args] = argv;

    switch (name) {
        case 'go':
            expectArgs(name, args, 1);
            return { type: 'Go', direction: requireDirection(name, args[0]) };
        case 'switch':
            expectArgs(name, args, 2);
            return {
                type: 'SwitchTo',
                x: requireCoordinate(name, 'x', args[0]),
                y: requireCoordinate(name, 'y', args[1]),
            };
        case 'move':
            expectArgs(name, args, 1);
            return { type: 'MoveWindowAndGo', direction: requireDirection(name, args[0]) };
        case 'move-to-monitor': {
            expectArgs(name, args, 1);
            const direction = parseDirection(args[0]);
            if (direction) {
                return { type: 'MoveWindowToMonitor', direction };
            }
            if (args[0] !== undefined && /^\d+$/.test(args[0])) {
                return { type: 'MoveWindowToMonitorIndex', index: parseInt(args[0], 10) };
            }
            throw new UsageError(`${name} expects a direction or a monitor index, got ${args[0] === undefined ? 'nothing' : `"${args[0]}"`}`);
        }
        case 'toggle':
            expectArgs(name, args, 0);
            return { type: 'ToggleVisualizer' };
        case 'raw': {
            expectArgs(name, args, 1);
            if (args[0] === undefined) {
                throw new UsageError('raw expects one JSON argument');
            }
            let value: unknown;
            try {
                value = JSON.parse(args[0]);
            } catch (error) {
                throw new UsageError(`raw: invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
            }
            try {
                return decodeCommand(value);
            } catch (error) {
                if (error instanceof WireFormatError) {
                    throw new UsageError(`raw: ${error.message}`);
                }
                throw error;
            }
        }
        default:
            throw new UsageError(`Unknown command: ${name}`);
    }
}
