import {PassThrough, Readable, Writable} from 'node:stream';

import {CoreV1Api, Exec, KubeConfig, PortForward, type V1Status} from '@kubernetes/client-node';
import type {ScopedCredential} from '@tunnel-broker/credentials';

import type {PortForwardChannel, WorkloadRuntime} from './runtime';

const CLUSTER_NAME = 'workload-cluster';
const CONTEXT_NAME = 'scoped-session';

const toBuffer = (chunk: unknown) => (Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));

const sinkTo = (consume: (chunk: Buffer) => void) =>
  new Writable({
    write(chunk: unknown, _encoding, callback) {
      consume(toBuffer(chunk));
      callback();
    }
  });

/** Kubeconfig whose only user is the session's scoped service-account token. */
export const createScopedKubeConfig = (credential: ScopedCredential) => {
  const kubeConfig = new KubeConfig();
  const {cluster, handle} = credential;
  kubeConfig.loadFromOptions({
    clusters: [
      {
        name: CLUSTER_NAME,
        server: cluster.server,
        skipTLSVerify: cluster.skipTLSVerify ?? false,
        ...(cluster.caData ? {caData: cluster.caData} : {}),
        ...(cluster.caFile ? {caFile: cluster.caFile} : {})
      }
    ],
    users: [{name: handle.principalName, token: credential.token}],
    contexts: [{name: CONTEXT_NAME, cluster: CLUSTER_NAME, user: handle.principalName, namespace: handle.namespace}],
    currentContext: CONTEXT_NAME
  });

  return kubeConfig;
};

/**
 * Exit status of a finished remote command. The API server reports non-zero exits as
 * a Failure status whose `ExitCode` cause carries the number; any other failure means
 * the command never ran.
 */
export const exitCodeFromStatus = (status: V1Status) => {
  if (status.status === 'Success') {
    return 0;
  }

  const cause = status.details?.causes?.find(candidate => candidate.reason === 'ExitCode');
  const exitCode = cause?.message === undefined ? Number.NaN : Number.parseInt(cause.message, 10);
  if (Number.isInteger(exitCode)) {
    return exitCode;
  }

  throw new Error(status.message ?? 'Remote command failed to start');
};

export const createKubernetesWorkloadRuntime = (credential: ScopedCredential): WorkloadRuntime => {
  const kubeConfig = createScopedKubeConfig(credential);
  const {workloadName, namespace} = credential.workload;
  const remoteExec = new Exec(kubeConfig);
  const forwarder = new PortForward(kubeConfig);
  let containerName = credential.workload.container;

  const resolveContainer = async () => {
    if (containerName) {
      return containerName;
    }

    const pod = await kubeConfig.makeApiClient(CoreV1Api).readNamespacedPod({name: workloadName, namespace});
    const first = pod.spec?.containers[0]?.name;
    if (!first) {
      throw new Error(`Pod ${namespace}/${workloadName} has no containers`);
    }

    containerName = first;
    return first;
  };

  const exec: WorkloadRuntime['exec'] = async ({command, stdin, onStdout, onStderr, signal}) => {
    const container = await resolveContainer();
    signal.throwIfAborted();

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (outcome: () => void) => {
        if (!settled) {
          settled = true;
          outcome();
        }
      };

      remoteExec
        .exec(
          namespace,
          workloadName,
          container,
          command,
          sinkTo(onStdout),
          sinkTo(onStderr),
          stdin ? Readable.from([stdin]) : null,
          false,
          status => {
            settle(() => {
              try {
                resolve({exitCode: exitCodeFromStatus(status)});
              } catch (error) {
                reject(error);
              }
            });
          }
        )
        .then(
          socket => {
            const abort = () => socket.close();
            socket.on('close', () => {
              signal.removeEventListener('abort', abort);
              settle(() => reject(signal.reason ?? new Error('Remote command stream closed without a status')));
            });
            // The tunnel may have gone away while the stream was connecting.
            if (signal.aborted) {
              abort();
              return;
            }
            signal.addEventListener('abort', abort, {once: true});
          },
          (error: unknown) => settle(() => reject(error))
        );
    });
  };

  const openPortForward: WorkloadRuntime['openPortForward'] = async ({port, onData, onClose}) => {
    const input = new PassThrough();
    const errors: Buffer[] = [];
    const connection = await forwarder.portForward(
      namespace,
      workloadName,
      [port],
      sinkTo(onData),
      sinkTo(chunk => errors.push(chunk)),
      input
    );
    const socket = typeof connection === 'function' ? connection() : connection;
    if (!socket) {
      input.destroy();
      throw new Error(`Port-forward to ${namespace}/${workloadName}:${port} was not established`);
    }

    socket.on('close', () => {
      const reason = Buffer.concat(errors).toString('utf8').trim();
      onClose(reason.length > 0 ? reason : undefined);
    });

    const channel: PortForwardChannel = {
      write: chunk => {
        input.write(chunk);
      },
      close: () => {
        input.end();
        socket.close();
      }
    };
    return channel;
  };

  return {exec, openPortForward};
};
