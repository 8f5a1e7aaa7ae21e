#!/usr/bin/env node
/**
 * gridctl
 *
 * Sends one command to the running daemon over its Unix socket.
 *
 * Usage:
 *   gridctl go right
 *   gridctl move-to-monitor 1
 *
 * In development:
 *   npx tsx server/cli.ts go right
 */

import 'dotenv/config';

import net from 'net';
import { serializeCommand } from './ipc/wireFormat';
import { defaultSocketPath } from './config/daemonConfig';
import { buildCommand, USAGE, UsageError } from './cli/commandLine';
import type { Command } from '../shared/types/command';

function send(socketPath: string, command: Command): Promise<void> {
    return new Promise((resolve, reject) => {
        const socket = net.createConnection(socketPath, () => {
            socket.end(`${serializeCommand(command)}\n`);
        });
        socket.on('error', reject);
        socket.on('close', hadError => {
            if (!hadError) resolve();
        });
    });
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('-h') || args.includes('--help')) {
        console.log(USAGE);
        process.exit(0);
    }

    let command: Command;
    try {
        command = buildCommand(args);
    } catch (error) {
        if (error instanceof UsageError) {
            console.error(`Error: ${error.message}`);
            console.error(USAGE);
            process.exit(1);
        }
        throw error;
    }

    const socketPath = defaultSocketPath();
    try {
        await send(socketPath, command);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`Cannot reach gridswitch daemon at ${socketPath}: ${message}`);
        process.exit(1);
    }
}

main().catch((err) => {
    console.error('Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
