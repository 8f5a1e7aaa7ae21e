/**
 * Switcher Error Types
 *
 * A failed command never throws out of the switcher. It comes back as a
 * CommandResult carrying a SwitcherError, which records the command, a
 * code and the underlying reason.
 *
 * @module server/switcher/errors
 */

import type { Command } from '../../shared/types/command';
import { describeCommand } from '../../shared/types/command';
import { BackendError, extractErrorMessage } from '../wm/errors';
import { ResolutionError, ResolutionErrorCode } from '../monitors/resolver';

// ============================================================================
// ERROR CODES
// ============================================================================

export type SwitcherErrorCode =
    | 'BACKEND_FAILED'      // Window manager rejected or could not be reached
    | ResolutionErrorCode   // Monitor lookup failed; no backend move attempted
    | 'QUEUE_CLOSED'        // Daemon shutting down
    | 'INTERNAL';           // Unexpected exception while handling

// ============================================================================
// SWITCHER ERROR CLASS
// ============================================================================

export class SwitcherError extends Error {
    public readonly name = 'SwitcherError';

    constructor(
        public readonly code: SwitcherErrorCode,
        public readonly command: Command,
        message: string,
        public readonly cause?: unknown
    ) {
        super(message);
    }
}

export interface CommandFailure {
    ok: false;
    error: SwitcherError;
}

export type CommandResult = { ok: true } | CommandFailure;

export const OK: CommandResult = { ok: true };

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Wrap whatever a command handler threw into a SwitcherError.
 */
export function toSwitcherError(command: Command, error: unknown): SwitcherError {
    if (error instanceof SwitcherError) {
        return error;
    }

    const label = describeCommand(command);

    if (error instanceof ResolutionError) {
        return new SwitcherError(error.code, command, `${label}: ${error.message}`, error);
    }

    if (error instanceof BackendError) {
        return new SwitcherError('BACKEND_FAILED', command,
            `${label}: window manager error (${error.code}): ${error.message}`,
            error
        );
    }

    return new SwitcherError('INTERNAL', command, `${label}: ${extractErrorMessage(error)}`, error);
}

export function failed(command: Command, error: unknown): CommandFailure {
    return { ok: false, error: toSwitcherError(command, error) };
}
