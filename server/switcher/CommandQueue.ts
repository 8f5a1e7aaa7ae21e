/**
 * Command Queue
 *
 * Single-consumer ordered queue in front of the switcher. Every transport
 * (socket clients, compositor events, HTTP) enqueues here; commands are
 * handled strictly one at a time in arrival order, so the switcher never
 * sees interleaved mutation and needs no locking.
 *
 * Nothing is dropped or coalesced: a slow backend call simply holds up the
 * commands behind it.
 *
 * @example
 * const queue = new CommandQueue(command => switcher.handle(command));
 * const result = await queue.enqueue({ type: 'Go', direction: 'Right' });
 */

import logger from '../utils/logger';
import type { Command } from '../../shared/types/command';
import { describeCommand } from '../../shared/types/command';
import { CommandResult, failed, SwitcherError } from './errors';

export type CommandHandler = (command: Command) => Promise<CommandResult>;

interface QueuedCommand {
    command: Command;
    source: string;
    resolve: (result: CommandResult) => void;
}

export class CommandQueue {
    private readonly pending: QueuedCommand[] = [];
    private pumping: Promise<void> | null = null;
    private closed = false;
    private handledCount = 0;

    constructor(private readonly handler: CommandHandler) { }

    /**
     * Queue a command. Resolves with its result once it has been handled;
     * never rejects.
     */
    enqueue(command: Command, source = 'unknown'): Promise<CommandResult> {
        if (this.closed) {
            return Promise.resolve({
                ok: false,
                error: new SwitcherError('QUEUE_CLOSED', command, `${describeCommand(command)}: queue closed`),
            });
        }

        return new Promise<CommandResult>(resolve => {
            this.pending.push({ command, source, resolve });
            if (!this.pumping) {
                this.pumping = this.pump();
            }
        });
    }

    /**
     * Resolves once everything queued so far has been handled.
     */
    async drain(): Promise<void> {
        while (this.pumping) {
            await this.pumping;
        }
    }

    /**
     * Refuse new commands. Already queued ones still run; await drain() for them.
     */
    close(): void {
        this.closed = true;
    }

    get length(): number {
        return this.pending.length;
    }

    get handled(): number {
        return this.handledCount;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    private async pump(): Promise<void> {
        let next = this.pending.shift();
        while (next) {
            const { command, source, resolve } = next;
            logger.debug(`[Queue] Handling: command=${describeCommand(command)} source=${source} backlog=${this.pending.length}`);

            let result: CommandResult;
            try {
                result = await this.handler(command);
            } catch (error) {
                result = failed(command, error);
                logger.error(`[Queue] Handler threw: command=${describeCommand(command)} error="${result.error.message}"`);
            }

            this.handledCount++;
            resolve(result);
            next = this.pending.shift();
        }
        this.pumping = null;
    }
}
