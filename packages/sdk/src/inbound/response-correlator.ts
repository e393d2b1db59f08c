/**
 * Response Correlator
 *
 * Single-delivery handoff between the dispatcher producing a direct response
 * and the exchange waiting for it. A slot is registered once the message is
 * known to request a direct response, so a reply produced before the wait
 * starts is held rather than dropped.
 */

import {
  ErrorCodes,
  ExchangeStateError,
  type ResponsePayload,
} from '@walletgate/core';

type Waiter = (payload: ResponsePayload | null) => void;

interface ResponseSlot {
  /** No further deliveries are accepted */
  settled: boolean;
  payload: ResponsePayload | null;
  waiter: Waiter | null;
}

export class ResponseCorrelator {
  private slots = new Map<string, ResponseSlot>();

  get pendingCount(): number {
    return this.slots.size;
  }

  isRegistered(exchangeId: string): boolean {
    return this.slots.has(exchangeId);
  }

  register(exchangeId: string): void {
    if (this.slots.has(exchangeId)) {
      throw new ExchangeStateError(`Response slot already registered for ${exchangeId}`, exchangeId);
    }
    this.slots.set(exchangeId, { settled: false, payload: null, waiter: null });
  }

  /**
   * Hand a payload to the exchange. Never blocks; returns false and drops the
   * payload when the exchange is unknown, released, timed out or already
   * answered.
   */
  deliver(exchangeId: string, payload: ResponsePayload): boolean {
    const slot = this.slots.get(exchangeId);
    if (!slot || slot.settled) {
      return false;
    }

    slot.settled = true;
    if (slot.waiter) {
      const waiter = slot.waiter;
      slot.waiter = null;
      waiter(payload);
    } else {
      slot.payload = payload;
    }
    return true;
  }

  /**
   * Wait for the exchange's payload. Resolves null on timeout or abort; both
   * settle the slot so a late delivery is refused.
   */
  wait(exchangeId: string, timeoutMs: number, signal?: AbortSignal): Promise<ResponsePayload | null> {
    const slot = this.slots.get(exchangeId);
    if (!slot) {
      return Promise.reject(
        new ExchangeStateError(`No response slot registered for ${exchangeId}`, exchangeId),
      );
    }

    if (slot.waiter) {
      return Promise.reject(
        new ExchangeStateError(
          `A response wait is already pending for ${exchangeId}`,
          exchangeId,
          ErrorCodes.RESPONSE_WAIT_CONFLICT,
        ),
      );
    }

    if (slot.settled) {
      const payload = slot.payload;
      slot.payload = null;
      return Promise.resolve(payload);
    }

    if (signal?.aborted) {
      slot.settled = true;
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const timeout = setTimeout(() => finish(null), timeoutMs);

      const onAbort = () => finish(null);

      const finish: Waiter = (payload) => {
        cleanup();
        slot.settled = true;
        resolve(payload);
      };

      const cleanup = () => {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        if (slot.waiter === finish) {
          slot.waiter = null;
        }
      };

      slot.waiter = finish;
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Drop the slot; a pending waiter resolves null */
  release(exchangeId: string): void {
    const slot = this.slots.get(exchangeId);
    if (!slot) return;

    this.slots.delete(exchangeId);
    slot.settled = true;
    slot.payload = null;
    slot.waiter?.(null);
  }
}
