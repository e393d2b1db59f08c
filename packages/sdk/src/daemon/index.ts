export {
  startInboundDaemon,
  createListeners,
  type InboundDaemonOptions,
  type InboundDaemonInstance,
} from './daemon.js';
export {
  loadDaemonSettings,
  toDaemonSettings,
  inboundEnvSchema,
  type DaemonSettings,
  type InboundEnv,
  type LoadEnvOptions,
} from './env.js';
