/**
 * In-memory queue of steps waiting for a human decision.
 *
 * `queue.gate` plugs into the step executor as its approval gate. Each
 * request becomes a pending approval that a UI lists and resolves, either
 * with an explicit decision or with the free text a user typed back.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { ApprovalDecision, ApprovalGate, ApprovalRequest } from './types.js';
import { describeError } from './errors.js';

/** Replies that count as approval; anything else is a denial. */
export const APPROVAL_WORDS: ReadonlySet<string> = new Set([
  'approve',
  'approved',
  'yes',
  'y',
  'ok',
  'continue',
  'allow',
]);

export function parseApprovalDecision(text: string): ApprovalDecision {
  return APPROVAL_WORDS.has(text.trim().toLowerCase()) ? 'approved' : 'denied';
}

export interface PendingApproval extends ApprovalRequest {
  id: string;
  session_key: string;
  requested_at: string;
}

export type ApprovalRequestHandler = (approval: PendingApproval, queue: ApprovalQueue) => void;

export interface ApprovalQueueOptions {
  /** Deny requests left unanswered this long; null waits forever */
  timeoutMs?: number | null;
  /** Conversation the approval prompts are routed to */
  sessionKey?: string;
  /** Called for every new request, e.g. to notify a UI */
  onRequest?: ApprovalRequestHandler;
  logger?: Logger;
}

interface Waiter {
  approval: PendingApproval;
  settle: (decision: ApprovalDecision) => void;
}

export class ApprovalQueue {
  private readonly waiters = new Map<string, Waiter>();
  private readonly timeoutMs: number | null;
  private readonly sessionKey: string;
  private readonly onRequest?: ApprovalRequestHandler;
  private readonly logger: Logger;

  constructor(options: ApprovalQueueOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? null;
    this.sessionKey = options.sessionKey ?? 'dashboard:approvals';
    this.onRequest = options.onRequest;
    this.logger = options.logger ?? silentLogger;
  }

  readonly gate: ApprovalGate = (request, signal) => this.request(request, signal);

  /** Pending approvals, oldest first. */
  list(): PendingApproval[] {
    return [...this.waiters.values()].map((w) => ({ ...w.approval }));
  }

  get size(): number {
    return this.waiters.size;
  }

  isPending(id: string): boolean {
    return this.waiters.has(id);
  }

  /** Returns false when no pending approval has this id. */
  resolve(id: string, decision: ApprovalDecision): boolean {
    const waiter = this.waiters.get(id);
    if (!waiter) return false;
    waiter.settle(decision);
    return true;
  }

  resolveText(id: string, text: string): boolean {
    return this.resolve(id, parseApprovalDecision(text));
  }

  private request(request: ApprovalRequest, signal: AbortSignal): Promise<ApprovalDecision> {
    if (signal.aborted) return Promise.resolve('denied');

    return new Promise((resolve) => {
      const approval: PendingApproval = {
        ...request,
        id: `approval_${randomUUID().replace(/-/g, '').slice(0, 10)}`,
        session_key: this.sessionKey,
        requested_at: new Date().toISOString(),
      };

      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = (): void => settle('denied');

      const settle = (decision: ApprovalDecision): void => {
        if (!this.waiters.delete(approval.id)) return;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        resolve(decision);
      };

      this.waiters.set(approval.id, { approval, settle });
      signal.addEventListener('abort', onAbort, { once: true });

      if (this.timeoutMs !== null) {
        const timeoutMs = this.timeoutMs;
        timer = setTimeout(() => {
          this.logger.warn(`Approval ${approval.id} timed out after ${timeoutMs}ms; denying`, {
            run_id: approval.run_id,
            step_id: approval.step_id,
          });
          settle('denied');
        }, timeoutMs);
      }

      if (this.onRequest) {
        try {
          this.onRequest({ ...approval }, this);
        } catch (err) {
          this.logger.warn('Approval listener failed', { id: approval.id, error: describeError(err) });
        }
      }
    });
  }
}
