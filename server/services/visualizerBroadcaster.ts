/**
 * Visualizer Broadcaster
 *
 * Fan-out point for visualizer notifications. The switcher publishes here;
 * any number of listeners (SSE stream, debug logger, tests) subscribe
 * without the switcher knowing about them.
 */

import { EventEmitter } from 'events';
import logger from '../utils/logger';
import type { VisualizerEvent } from '../../shared/types/visualizer';

/**
 * What the switcher needs from a visualizer
 */
export interface VisualizerSink {
    publish(event: VisualizerEvent): void;
}

type VisualizerListener = (event: VisualizerEvent) => void;

export class VisualizerBroadcaster extends EventEmitter implements VisualizerSink {
    publish(event: VisualizerEvent): void {
        logger.debug(`[Visualizer] Publish: type=${event.type} listeners=${this.listenerCount('visualizer')}`);
        this.emit('visualizer', event);
    }

    /**
     * Subscribe to every notification. Returns an unsubscribe function.
     */
    subscribe(listener: VisualizerListener): () => void {
        this.on('visualizer', listener);
        return () => {
            this.off('visualizer', listener);
        };
    }
}
