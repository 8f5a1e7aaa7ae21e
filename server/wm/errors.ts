/**
 * Window Manager Error Types
 *
 * Structured error classification for backend IPC. Every failure coming
 * out of a WindowManager implementation is a BackendError carrying one of
 * these codes, so the switcher can report it without knowing the backend.
 *
 * @module server/wm/errors
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export type BackendErrorCode =
    | 'CONFIG_INVALID'      // Socket path cannot be resolved from the environment
    | 'IPC_UNREACHABLE'     // ENOENT, ECONNREFUSED: compositor not running
    | 'DISPATCH_REJECTED'   // Compositor answered something other than "ok"
    | 'PARSE_FAILED'        // Query reply was not the JSON we expected
    | 'IPC_ERROR';          // Any other socket failure

// ============================================================================
// BACKEND ERROR CLASS
// ============================================================================

export class BackendError extends Error {
    public readonly name = 'BackendError';

    constructor(
        public readonly code: BackendErrorCode,
        message: string,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
    }
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

interface SocketLikeError {
    code?: string;
    message: string;
}

function isSocketLikeError(error: unknown): error is SocketLikeError {
    if (typeof error !== 'object' || error === null || !('message' in error)) {
        return false;
    }
    if (typeof error.message !== 'string') return false;
    return !('code' in error) || error.code === undefined || typeof error.code === 'string';
}

/**
 * Classify a raw socket error into a BackendError.
 */
export function classifySocketError(error: unknown, socketPath: string): BackendError {
    if (error instanceof BackendError) {
        return error;
    }

    if (isSocketLikeError(error)) {
        if (error.code === 'ENOENT' || error.code === 'ECONNREFUSED') {
            return new BackendError('IPC_UNREACHABLE',
                `Cannot reach compositor socket: ${error.code}`,
                { code: error.code, socketPath }
            );
        }
        return new BackendError('IPC_ERROR',
            `Compositor IPC failed: ${error.message}`,
            { code: error.code, socketPath }
        );
    }

    return new BackendError('IPC_ERROR', `Compositor IPC failed: ${String(error)}`, { socketPath });
}

/**
 * Extract a human-readable message from any error type.
 */
export function extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
