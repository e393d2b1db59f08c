import type { ExchangeState, ExchangeInfo, PeerInfo } from '../types/exchange.js';

// ========== Transition Table ==========

const EXCHANGE_TRANSITIONS: Record<ExchangeState, ExchangeState[]> = {
  open: ['context_resolved', 'closed'],
  context_resolved: ['receiving', 'closed'],
  receiving: ['awaiting_response', 'no_response', 'closed'],
  awaiting_response: ['responded', 'no_response', 'closed'],
  responded: ['closed'],
  no_response: ['closed'],
  closed: [],
};

export function isTerminalExchangeState(state: ExchangeState): boolean {
  return EXCHANGE_TRANSITIONS[state].length === 0;
}

export function isValidExchangeTransition(
  from: ExchangeState,
  to: ExchangeState,
): boolean {
  return EXCHANGE_TRANSITIONS[from].includes(to);
}

// ========== Events ==========

export type ExchangeEvent =
  | { type: 'CONTEXT_RESOLVED' }
  | { type: 'BEGIN_RECEIVE' }
  | { type: 'AWAIT_RESPONSE' }
  | { type: 'RESPONSE_DELIVERED' }
  | { type: 'NO_RESPONSE' }
  | { type: 'CLOSE' };

export interface ExchangeTransitionResult {
  success: boolean;
  newState: ExchangeState;
  error?: string;
}

// ========== State Machine ==========

export class ExchangeStateMachine {
  private state: ExchangeState = 'open';

  constructor(initialState?: ExchangeState) {
    if (initialState) {
      this.state = initialState;
    }
  }

  getState(): ExchangeState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalExchangeState(this.state);
  }

  transition(event: ExchangeEvent): ExchangeTransitionResult {
    const targetState = this.getTargetState(event);

    if (!targetState) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid event ${event.type} for state ${this.state}`,
      };
    }

    if (!isValidExchangeTransition(this.state, targetState)) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid transition from ${this.state} to ${targetState}`,
      };
    }

    this.state = targetState;
    return {
      success: true,
      newState: this.state,
    };
  }

  private getTargetState(event: ExchangeEvent): ExchangeState | null {
    switch (event.type) {
      case 'CONTEXT_RESOLVED':
        return this.state === 'open' ? 'context_resolved' : null;

      case 'BEGIN_RECEIVE':
        return this.state === 'context_resolved' ? 'receiving' : null;

      case 'AWAIT_RESPONSE':
        return this.state === 'receiving' ? 'awaiting_response' : null;

      case 'RESPONSE_DELIVERED':
        return this.state === 'awaiting_response' ? 'responded' : null;

      case 'NO_RESPONSE':
        return this.state === 'receiving' || this.state === 'awaiting_response'
          ? 'no_response'
          : null;

      case 'CLOSE':
        return isTerminalExchangeState(this.state) ? null : 'closed';

      default:
        return null;
    }
  }
}

// ========== Factory ==========

export function createExchangeInfo(params: {
  id: string;
  peer: PeerInfo;
  acceptUndelivered: boolean;
}): ExchangeInfo {
  return {
    id: params.id,
    peer: { ...params.peer },
    state: 'open',
    tenantId: null,
    canRespond: true,
    acceptUndelivered: params.acceptUndelivered,
    openedAt: new Date().toISOString(),
  };
}
