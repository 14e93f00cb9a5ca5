import type { Logger } from 'pino';
import type { JsonValue } from '@runtrail/shared';
import { createLogger } from './logger.js';

export interface Observer {
  onNodeStart(node: string, inputs: JsonValue): void;
  onNodeEnd(node: string, outputs: JsonValue): void;
  onNodeError(node: string, error: string): void;
}

/** Writes node events to the log, one line per event. */
export class LoggingObserver implements Observer {
  constructor(private readonly log: Pick<Logger, 'info' | 'error'> = createLogger('observer')) {}

  onNodeStart(node: string, inputs: JsonValue): void {
    this.log.info({ node, inputs }, 'node started');
  }

  onNodeEnd(node: string, outputs: JsonValue): void {
    this.log.info({ node, outputs }, 'node completed');
  }

  onNodeError(node: string, error: string): void {
    this.log.error({ node, error }, 'node failed');
  }
}
