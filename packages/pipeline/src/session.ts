/**
 * Processing Session
 *
 * Holds the state a batch run shares with whoever started it: the
 * single-flight guard, the cancellation flag, and the event channel.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { SessionBusyError, errorMessage } from '@scenecut/core';
import { createLogger, type Logger } from '@scenecut/utils';
import type { PipelineEvent, PipelineEventListener } from './types.js';

const EVENT = 'pipeline-event';

export class ProcessingSession {
  readonly id: string;
  private emitter = new EventEmitter();
  private running = false;
  private cancelRequested = false;
  private log: Logger;

  constructor(id: string = randomUUID()) {
    this.id = id;
    this.log = createLogger({ component: 'processing-session', sessionId: id });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isCancelRequested(): boolean {
    return this.cancelRequested;
  }

  /**
   * Mark the session busy. Throws SessionBusyError if it already is.
   */
  begin(): void {
    if (this.running) {
      throw new SessionBusyError(this.id);
    }
    this.running = true;
  }

  end(): void {
    this.running = false;
    this.cancelRequested = false;
  }

  /**
   * Ask the running batch to stop before its next input.
   * The clip being extracted is allowed to finish.
   */
  requestCancel(): void {
    if (!this.cancelRequested) {
      this.log.info('Cancellation requested');
    }
    this.cancelRequested = true;
  }

  /**
   * Subscribe to pipeline events. Returns the unsubscribe function.
   */
  onEvent(listener: PipelineEventListener): () => void {
    const wrapped = (event: PipelineEvent): void => {
      try {
        listener(event);
      } catch (error) {
        this.log.warn({ eventType: event.type, error: errorMessage(error) }, 'Event listener threw');
      }
    };
    this.emitter.on(EVENT, wrapped);
    return () => {
      this.emitter.off(EVENT, wrapped);
    };
  }

  emitEvent(event: PipelineEvent): void {
    this.emitter.emit(EVENT, event);
  }
}
