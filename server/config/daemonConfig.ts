/**
 * Daemon Configuration
 *
 * Read once at startup from a JSON file, then overlaid with environment
 * variables. Keys in the file are snake_case; everything downstream sees the
 * camelCase DaemonConfig. A missing file means defaults. Unknown keys are
 * ignored.
 *
 * Every problem found is collected before throwing, so one ConfigError
 * reports the whole file.
 *
 * Environment:
 *   GRIDSWITCH_CONFIG  - config file path
 *   GRIDSWITCH_SOCKET  - command socket path
 *   PORT               - HTTP port
 *   LOG_LEVEL          - error | warn | info | debug
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import type { GestureConfig } from '../gestures/types';
import { DEFAULT_GESTURE_CONFIG } from '../gestures/types';
import type { LogLevel } from '../utils/logger';
import { LOG_LEVELS } from '../utils/logger';

// ============================================================================
// TYPES
// ============================================================================

export interface HttpConfig {
    enabled: boolean;
    port: number;
}

export interface EventsConfig {
    enabled: boolean;
}

export interface DaemonConfig {
    socketPath: string;
    gestures: GestureConfig;
    http: HttpConfig;
    events: EventsConfig;
    logLevel: LogLevel;
    /** File the values came from; null when defaults were used */
    source: string | null;
}

export class ConfigError extends Error {
    public readonly name = 'ConfigError';

    constructor(public readonly problems: string[], public readonly source: string | null) {
        super(`Invalid configuration${source ? ` in ${source}` : ''}: ${problems.join('; ')}`);
    }
}

export const DEFAULT_HTTP_PORT = 3791;

// ============================================================================
// PATHS
// ============================================================================

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    if (env.GRIDSWITCH_CONFIG) return env.GRIDSWITCH_CONFIG;
    const configHome = env.XDG_CONFIG_HOME || path.join(env.HOME || os.homedir(), '.config');
    return path.join(configHome, 'gridswitch', 'config.json');
}

export function defaultSocketPath(env: NodeJS.ProcessEnv = process.env): string {
    if (env.GRIDSWITCH_SOCKET) return env.GRIDSWITCH_SOCKET;
    const runtimeDir = env.XDG_RUNTIME_DIR || os.tmpdir();
    return path.join(runtimeDir, 'gridswitch.sock');
}

// ============================================================================
// VALIDATION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Collects problems while reading one section. Each reader returns the
 * fallback when the key is absent or invalid.
 */
class SectionReader {
    constructor(
        private readonly section: Record<string, unknown>,
        private readonly prefix: string,
        private readonly problems: string[]
    ) { }

    number(key: string, fallback: number, check: (value: number) => boolean, rule: string): number {
        const value = this.section[key];
        if (value === undefined) return fallback;
        return this.checked(key, value, check, rule) ?? fallback;
    }

    nullableNumber(key: string, fallback: number | null, check: (value: number) => boolean, rule: string): number | null {
        const value = this.section[key];
        if (value === undefined) return fallback;
        if (value === null) return null;
        return this.checked(key, value, check, rule) ?? fallback;
    }

    boolean(key: string, fallback: boolean): boolean {
        const value = this.section[key];
        if (value === undefined) return fallback;
        if (typeof value !== 'boolean') {
            this.problems.push(`${this.prefix}${key} must be true or false (got ${JSON.stringify(value)})`);
            return fallback;
        }
        return value;
    }

    private checked(key: string, value: unknown, check: (value: number) => boolean, rule: string): number | null {
        if (typeof value !== 'number' || !Number.isFinite(value) || !check(value)) {
            this.problems.push(`${this.prefix}${key} must be ${rule} (got ${JSON.stringify(value)})`);
            return null;
        }
        return value;
    }
}

function section(root: Record<string, unknown>, key: string, problems: string[]): Record<string, unknown> {
    const value = root[key];
    if (value === undefined) return {};
    if (!isRecord(value)) {
        problems.push(`${key} must be an object`);
        return {};
    }
    return value;
}

const inUnitInterval = (value: number) => value > 0 && value <= 1;
const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;
const isPort = (value: number) => Number.isInteger(value) && value >= 1 && value <= 65535;

/**
 * Validate a parsed config file (already JSON-decoded) plus environment
 * overrides.
 * @throws ConfigError
 */
export function parseConfig(
    raw: unknown,
    env: NodeJS.ProcessEnv = process.env,
    source: string | null = null
): DaemonConfig {
    const problems: string[] = [];
    const root = raw === undefined ? {} : raw;

    if (!isRecord(root)) {
        throw new ConfigError(['top level must be an object'], source);
    }

    const g = new SectionReader(section(root, 'gestures', problems), 'gestures.', problems);
    const defaults = DEFAULT_GESTURE_CONFIG;
    const gestures: GestureConfig = {
        sensitivity: g.number('sensitivity', defaults.sensitivity, v => v > 0, 'a number > 0'),
        commitThreshold: g.number('commit_threshold', defaults.commitThreshold, inUnitInterval, 'in (0, 1]'),
        commitWhileDraggingThreshold: g.nullableNumber(
            'commit_while_dragging_threshold',
            defaults.commitWhileDraggingThreshold,
            inUnitInterval,
            'null or in (0, 1]'
        ),
        switchFingers: g.number('switch_fingers', defaults.switchFingers, isPositiveInteger, 'a positive integer'),
        moveFingers: g.number('move_fingers', defaults.moveFingers, isPositiveInteger, 'a positive integer'),
        naturalSwiping: g.boolean('natural_swiping', defaults.naturalSwiping),
    };
    if (gestures.switchFingers === gestures.moveFingers) {
        problems.push(`gestures.switch_fingers and gestures.move_fingers must differ (both ${gestures.switchFingers})`);
    }

    const h = new SectionReader(section(root, 'http', problems), 'http.', problems);
    const http: HttpConfig = {
        enabled: h.boolean('enabled', true),
        port: h.number('port', DEFAULT_HTTP_PORT, isPort, 'an integer in 1-65535'),
    };

    const e = new SectionReader(section(root, 'events', problems), 'events.', problems);
    const events: EventsConfig = {
        enabled: e.boolean('enabled', false),
    };

    let logLevel: LogLevel = 'info';
    if (root.log_level !== undefined) {
        if (isLogLevel(root.log_level)) {
            logLevel = root.log_level;
        } else {
            problems.push(`log_level must be one of ${LOG_LEVELS.join('|')} (got ${JSON.stringify(root.log_level)})`);
        }
    }

    // Environment overrides
    if (env.PORT !== undefined && env.PORT !== '') {
        const port = Number(env.PORT);
        if (isPort(port)) {
            http.port = port;
        } else {
            problems.push(`PORT must be an integer in 1-65535 (got ${JSON.stringify(env.PORT)})`);
        }
    }
    if (env.LOG_LEVEL !== undefined && env.LOG_LEVEL !== '') {
        if (isLogLevel(env.LOG_LEVEL)) {
            logLevel = env.LOG_LEVEL;
        } else {
            problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join('|')} (got ${JSON.stringify(env.LOG_LEVEL)})`);
        }
    }

    if (problems.length > 0) {
        throw new ConfigError(problems, source);
    }

    return {
        socketPath: defaultSocketPath(env),
        gestures,
        http,
        events,
        logLevel,
        source,
    };
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Read and validate the config file. A missing file yields defaults.
 * @throws ConfigError
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DaemonConfig {
    const file = defaultConfigPath(env);

    let text: string;
    try {
        text = fs.readFileSync(file, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return parseConfig(undefined, env, null);
        }
        throw new ConfigError([`cannot read file: ${error instanceof Error ? error.message : String(error)}`], file);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError([`invalid JSON: ${error instanceof Error ? error.message : String(error)}`], file);
    }

    return parseConfig(raw, env, file);
}
