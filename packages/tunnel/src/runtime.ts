import type {ScopedCredential} from '@tunnel-broker/credentials';

export type ExecInput = {
  command: string[];
  stdin?: Buffer;
  onStdout: (chunk: Buffer) => void;
  onStderr: (chunk: Buffer) => void;
  signal: AbortSignal;
};

export type ExecResult = {
  exitCode: number;
};

export type PortForwardInput = {
  port: number;
  onData: (chunk: Buffer) => void;
  onClose: (reason?: string) => void;
};

export type PortForwardChannel = {
  write: (chunk: Buffer) => void;
  close: () => void;
};

/** Remote primitives of one workload, reached with one session's scoped credential. */
export type WorkloadRuntime = {
  exec: (input: ExecInput) => Promise<ExecResult>;
  openPortForward: (input: PortForwardInput) => Promise<PortForwardChannel>;
};

export type WorkloadRuntimeFactory = (credential: ScopedCredential) => WorkloadRuntime;
