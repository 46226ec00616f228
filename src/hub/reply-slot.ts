/**
 * Single-slot rendezvous between send() and the notification path.
 *
 * Holds at most one outstanding request. open() hands back a promise that
 * settles when a matching reply is offered, when the slot is failed
 * (write error, teardown) or when the optional timeout expires. Every
 * outcome empties the slot.
 */

import { DownstreamMessage, UpstreamMessage } from '../messages';
import { PendingRequestError, ReplyTimeoutError } from '../errors';

interface PendingRequest {
  request: DownstreamMessage;
  resolve: (reply: UpstreamMessage) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class ReplySlot {
  private pending: PendingRequest | null = null;

  /** The request currently waiting for its reply */
  get request(): DownstreamMessage | undefined {
    return this.pending?.request;
  }

  get busy(): boolean {
    return this.pending !== null;
  }

  /**
   * Claim the slot for `request`. Throws PendingRequestError synchronously
   * if the slot is taken. `timeoutMs` of 0 waits forever.
   */
  open(request: DownstreamMessage, timeoutMs = 0): Promise<UpstreamMessage> {
    if (this.pending) {
      throw new PendingRequestError(
        `Pending request ${this.pending.request.toString()} while trying to send ${request.toString()}`,
      );
    }

    return new Promise<UpstreamMessage>((resolve, reject) => {
      const entry: PendingRequest = { request, resolve, reject, timer: null };
      if (timeoutMs > 0) {
        entry.timer = setTimeout(() => {
          if (this.pending !== entry) return;
          this.pending = null;
          reject(new ReplyTimeoutError(`No reply to ${request.toString()} within ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs);
      }
      this.pending = entry;
    });
  }

  /** Complete the pending request if `msg` answers it. Returns whether it did. */
  offer(msg: UpstreamMessage): boolean {
    if (!this.pending || !msg.isReplyTo(this.pending.request)) return false;
    return this.fulfil(msg);
  }

  /** Complete the pending request with `msg` regardless of correlation */
  fulfil(msg: UpstreamMessage): boolean {
    const entry = this.take();
    if (!entry) return false;
    entry.resolve(msg);
    return true;
  }

  /**
   * Reject the pending request. With `request` given, only if that is the
   * one pending, so a late failure can't hit a newer request.
   */
  fail(err: Error, request?: DownstreamMessage): boolean {
    if (request && this.pending?.request !== request) return false;
    const entry = this.take();
    if (!entry) return false;
    entry.reject(err);
    return true;
  }

  private take(): PendingRequest | null {
    const entry = this.pending;
    if (!entry) return null;
    if (entry.timer) clearTimeout(entry.timer);
    this.pending = null;
    return entry;
  }
}
