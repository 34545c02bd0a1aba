/**
 * Lifecycle event helpers.
 *
 * Sinks are plain functions. fanOut() combines several of them so that a
 * sink that throws is logged and skipped instead of breaking the run that
 * emitted the event.
 */

import type { Logger } from '../logging/logger.js';
import type { EventSink, WorkflowEvent, WorkflowEventType } from './types.js';
import { describeError } from './errors.js';

export function createEvent(
  runId: string,
  type: WorkflowEventType,
  stepId?: string,
  detail: Record<string, unknown> = {},
): WorkflowEvent {
  return {
    run_id: runId,
    ...(stepId !== undefined ? { step_id: stepId } : {}),
    type,
    timestamp: new Date().toISOString(),
    detail,
  };
}

export function fanOut(sinks: readonly EventSink[], logger: Logger): EventSink {
  return (event) => {
    for (const sink of sinks) {
      try {
        sink(event);
      } catch (err) {
        logger.warn(`Event sink failed on ${event.type}`, {
          run_id: event.run_id,
          error: describeError(err),
        });
      }
    }
  };
}

const FAILURE_EVENTS: ReadonlySet<WorkflowEventType> = new Set<WorkflowEventType>([
  'step.failed',
  'step.retrying',
]);

/**
 * Sink that mirrors events into the log: failures and retries at warn,
 * run boundaries at info, everything else at debug.
 */
export function createLoggerSink(logger: Logger): EventSink {
  return (event) => {
    const subject = event.step_id ? `${event.run_id}/${event.step_id}` : event.run_id;
    const message = `${event.type} ${subject}`;

    if (FAILURE_EVENTS.has(event.type)) {
      logger.warn(message, event.detail);
    } else if (event.type.startsWith('run.')) {
      logger.info(message, event.detail);
    } else {
      logger.debug(message, event.detail);
    }
  };
}
