/**
 * @walletgate/core
 *
 * WalletGate Core - Exchange Types, State Machine, and Error Definitions
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// State Machine - Exchange
export {
  ExchangeStateMachine,
  isTerminalExchangeState,
  isValidExchangeTransition,
  createExchangeInfo,
  type ExchangeEvent,
  type ExchangeTransitionResult,
} from './state-machine/index.js';

// Errors
export * from './errors/index.js';
