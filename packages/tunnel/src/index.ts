export {CLOSE_IDLE, CLOSE_SESSION_ENDED, TunnelConnection, type TunnelState} from './connection';
export {toFileCommand, type FileCommand} from './fileCommands';
export {createInMemoryWorkload, type InMemoryWorkload} from './inMemoryRuntime';
export {createKubernetesWorkloadRuntime, createScopedKubeConfig, exitCodeFromStatus} from './kubernetesRuntime';
export {TunnelMultiplexer, type TunnelMultiplexerOptions} from './multiplexer';
export type {
  ExecInput,
  ExecResult,
  PortForwardChannel,
  PortForwardInput,
  WorkloadRuntime,
  WorkloadRuntimeFactory
} from './runtime';
export {parseTunnelUpgrade, rejectUpgrade, type TunnelUpgradeTarget} from './upgrade';
