/**
 * Command Wire Format
 *
 * Newline-delimited JSON, one command per line, externally tagged:
 *
 *   {"Go":"Right"}
 *   {"SwitchTo":{"x":2,"y":1}}
 *   {"MoveWindowToMonitorIndex":1}
 *   {"PrepareMove":{"dx":0.5,"dy":-0.3}}
 *   {"SwipeUpdate":{"fingers":3,"dx":12.5,"dy":-1}}
 *   "CancelMove"
 *
 * The native plugin forwarder writes exactly these bytes, so field names,
 * key order and the capitalised directions must not change.
 *
 * @module server/ipc/wireFormat
 */

import type { Command, CommandType, Direction } from '../../shared/types/command';
import { isDirection } from '../../shared/types/command';

// ============================================================================
// ERRORS
// ============================================================================

export class WireFormatError extends Error {
    public readonly name = 'WireFormatError';

    constructor(message: string, public readonly input?: string) {
        super(message);
    }
}

// ============================================================================
// TAGS
// ============================================================================

const UNIT_TAGS = ['CancelMove', 'SwipeEnd', 'ToggleVisualizer'] as const;
type UnitTag = typeof UNIT_TAGS[number];

const DIRECTION_TAGS = ['Go', 'MoveWindowAndGo', 'MoveWindowToMonitor', 'CommitMove'] as const;
type DirectionTag = typeof DIRECTION_TAGS[number];

function isUnitTag(tag: string): tag is UnitTag {
    return UNIT_TAGS.some(t => t === tag);
}

function isDirectionTag(tag: string): tag is DirectionTag {
    return DIRECTION_TAGS.some(t => t === tag);
}

// ============================================================================
// FIELD READERS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function payloadObject(tag: CommandType, payload: unknown): Record<string, unknown> {
    if (!isRecord(payload)) {
        throw new WireFormatError(`${tag} expects an object payload`);
    }
    return payload;
}

function readNumber(tag: CommandType, payload: Record<string, unknown>, field: string): number {
    const value = payload[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new WireFormatError(`${tag}.${field} must be a finite number`);
    }
    return value;
}

function readInteger(tag: CommandType, value: unknown, field: string, min?: number): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new WireFormatError(`${tag}.${field} must be an integer`);
    }
    if (min !== undefined && value < min) {
        throw new WireFormatError(`${tag}.${field} must be >= ${min}`);
    }
    return value;
}

function readDirection(tag: CommandType, value: unknown): Direction {
    if (!isDirection(value)) {
        throw new WireFormatError(`${tag} expects one of Left|Right|Up|Down, got ${JSON.stringify(value)}`);
    }
    return value;
}

// ============================================================================
// DECODE
// ============================================================================

/**
 * Decode an already-parsed JSON value into a Command.
 * @throws WireFormatError
 */
export function decodeCommand(value: unknown): Command {
    if (typeof value === 'string') {
        if (isUnitTag(value)) {
            return { type: value };
        }
        throw new WireFormatError(`Unknown command: ${value}`);
    }

    if (!isRecord(value)) {
        throw new WireFormatError('Command must be a string tag or an object with one key');
    }

    const keys = Object.keys(value);
    if (keys.length !== 1) {
        throw new WireFormatError(`Command object must have exactly one key, got ${keys.length}`);
    }

    const tag = keys[0];
    const payload = value[tag];

    if (isDirectionTag(tag)) {
        return { type: tag, direction: readDirection(tag, payload) };
    }

    switch (tag) {
        case 'SwitchTo': {
            const body = payloadObject(tag, payload);
            return {
                type: tag,
                x: readInteger(tag, body.x, 'x', 0),
                y: readInteger(tag, body.y, 'y', 0),
            };
        }
        case 'MoveWindowToMonitorIndex':
            return { type: tag, index: readInteger(tag, payload, 'index', 0) };
        case 'PrepareMove': {
            const body = payloadObject(tag, payload);
            return { type: tag, dx: readNumber(tag, body, 'dx'), dy: readNumber(tag, body, 'dy') };
        }
        case 'SwipeBegin': {
            const body = payloadObject(tag, payload);
            return { type: tag, fingers: readInteger(tag, body.fingers, 'fingers', 0) };
        }
        case 'SwipeUpdate': {
            const body = payloadObject(tag, payload);
            return {
                type: tag,
                fingers: readInteger(tag, body.fingers, 'fingers', 0),
                dx: readNumber(tag, body, 'dx'),
                dy: readNumber(tag, body, 'dy'),
            };
        }
        default:
            throw new WireFormatError(`Unknown command: ${tag}`);
    }
}

/**
 * Parse one line of wire input.
 * @throws WireFormatError
 */
export function parseCommandLine(line: string): Command {
    const text = line.trim();
    if (!text) {
        throw new WireFormatError('Empty command line', line);
    }

    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (error) {
        throw new WireFormatError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, line);
    }

    try {
        return decodeCommand(value);
    } catch (error) {
        if (error instanceof WireFormatError) {
            throw new WireFormatError(error.message, line);
        }
        throw error;
    }
}

// ============================================================================
// ENCODE
// ============================================================================

/**
 * Command → JSON value in wire shape.
 */
export function encodeCommand(command: Command): unknown {
    switch (command.type) {
        case 'Go':
        case 'MoveWindowAndGo':
        case 'MoveWindowToMonitor':
        case 'CommitMove':
            return { [command.type]: command.direction };
        case 'SwitchTo':
            return { SwitchTo: { x: command.x, y: command.y } };
        case 'MoveWindowToMonitorIndex':
            return { MoveWindowToMonitorIndex: command.index };
        case 'PrepareMove':
            return { PrepareMove: { dx: command.dx, dy: command.dy } };
        case 'SwipeBegin':
            return { SwipeBegin: { fingers: command.fingers } };
        case 'SwipeUpdate':
            return { SwipeUpdate: { fingers: command.fingers, dx: command.dx, dy: command.dy } };
        case 'CancelMove':
        case 'SwipeEnd':
        case 'ToggleVisualizer':
            return command.type;
    }
}

/**
 * Command → one wire line, without the trailing newline.
 */
export function serializeCommand(command: Command): string {
    return JSON.stringify(encodeCommand(command));
}
