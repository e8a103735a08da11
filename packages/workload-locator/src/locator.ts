import {setTimeout as sleepFor} from 'node:timers/promises';

import {createNoopLogger, type StructuredLogger} from '@tunnel-broker/logging';

import {
  orchestratorUserSchema,
  type FetchLike,
  type OrchestratorServer,
  type OrchestratorUser,
  type WorkloadLocation,
  type WorkloadNaming
} from './contracts';
import {err, ok, type LocatorResult} from './errors';
import {renderNameTemplate, toWorkloadUser} from './naming';

export type WorkloadLocator = {
  ensureRunning: (subject: string) => Promise<LocatorResult<WorkloadLocation>>;
  stop: (subject: string) => Promise<LocatorResult<void>>;
};

export type OrchestratorWorkloadLocatorOptions = {
  apiUrl: string;
  apiToken?: string;
  naming: WorkloadNaming;
  requestTimeoutMs: number;
  readyTimeoutMs: number;
  pollIntervalMs: number;
  fetchImpl?: FetchLike;
  logger?: StructuredLogger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

const defaultServerOf = (user: OrchestratorUser): OrchestratorServer | 'running' | null => {
  const named = user.servers?.[''];
  if (named) {
    return named;
  }

  if (typeof user.server === 'string') {
    return 'running';
  }

  return user.server ?? null;
};

const isReady = (user: OrchestratorUser) => {
  const server = defaultServerOf(user);
  return server === 'running' || (server !== null && server.ready);
};

/**
 * Locator backed by a JupyterHub-style REST API. The collaborator user is the identity
 * subject verbatim; workload and namespace names come from the naming templates unless
 * the ready server reports its own pod placement.
 */
export const createOrchestratorWorkloadLocator = ({
  apiUrl,
  apiToken,
  naming,
  requestTimeoutMs,
  readyTimeoutMs,
  pollIntervalMs,
  fetchImpl = fetch,
  logger = createNoopLogger(),
  now = () => new Date(),
  sleep = ms => sleepFor(ms)
}: OrchestratorWorkloadLocatorOptions): WorkloadLocator => {
  renderNameTemplate(naming.workloadNameTemplate, 'probe');
  renderNameTemplate(naming.namespaceTemplate, 'probe');
  const baseUrl = apiUrl.replace(/\/+$/u, '');

  const call = async ({
    method,
    path,
    expected
  }: {
    method: 'GET' | 'POST' | 'DELETE';
    path: string;
    expected: number[];
  }): Promise<LocatorResult<Response>> => {
    let response: Response;
    try {
      response = await fetchImpl(`${baseUrl}${path}`, {
        method,
        headers: {
          accept: 'application/json',
          ...(apiToken ? {authorization: `token ${apiToken}`} : {})
        },
        signal: AbortSignal.timeout(requestTimeoutMs)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unknown error';
      return err('upstream_unreachable', `${method} ${path} failed: ${reason}`);
    }

    if (!expected.includes(response.status)) {
      return err('upstream_error', `${method} ${path} returned status ${response.status}`);
    }

    return ok(response);
  };

  const userPath = (subject: string) => `/users/${encodeURIComponent(subject)}`;

  const getUser = async (subject: string): Promise<LocatorResult<OrchestratorUser | null>> => {
    const response = await call({method: 'GET', path: userPath(subject), expected: [200, 404]});
    if (!response.ok) {
      return response;
    }

    if (response.value.status === 404) {
      return ok(null);
    }

    let body: unknown;
    try {
      body = await response.value.json();
    } catch {
      return err('upstream_response_invalid', 'Orchestrator user response is not JSON');
    }

    const parsed = orchestratorUserSchema.safeParse(body);
    if (!parsed.success) {
      return err('upstream_response_invalid', 'Orchestrator user response has an unexpected shape');
    }

    return ok(parsed.data);
  };

  const toLocation = ({user, label}: {user: OrchestratorUser; label: string}): WorkloadLocation => {
    const server = defaultServerOf(user);
    const state = server !== null && server !== 'running' ? server.state : undefined;

    return {
      workloadName: state?.pod_name ?? renderNameTemplate(naming.workloadNameTemplate, label),
      namespace: state?.namespace ?? renderNameTemplate(naming.namespaceTemplate, label),
      ...(naming.container ? {container: naming.container} : {}),
      status: 'running'
    };
  };

  const waitUntilReady = async ({
    subject,
    label
  }: {
    subject: string;
    label: string;
  }): Promise<LocatorResult<WorkloadLocation>> => {
    const deadline = now().getTime() + readyTimeoutMs;

    for (;;) {
      const remaining = deadline - now().getTime();
      if (remaining <= 0) {
        logger.warn({
          event: 'workload.ensure.timeout',
          component: 'workload.locator',
          message: 'Workload did not become ready in time',
          reason_code: 'workload_unavailable',
          metadata: {ready_timeout_ms: readyTimeoutMs}
        });
        return err('workload_unavailable', `Workload for ${subject} was not ready within ${readyTimeoutMs} ms`);
      }

      await sleep(Math.min(pollIntervalMs, remaining));

      const polled = await getUser(subject);
      if (!polled.ok) {
        logger.debug({
          event: 'workload.ensure.poll_failed',
          component: 'workload.locator',
          reason_code: polled.error.code,
          message: polled.error.message
        });
        continue;
      }

      if (polled.value && isReady(polled.value)) {
        return ok(toLocation({user: polled.value, label}));
      }
    }
  };

  const ensureRunning: WorkloadLocator['ensureRunning'] = async subject => {
    const label = toWorkloadUser(subject);
    if (!label) {
      return err('workload_unavailable', `Identity subject ${JSON.stringify(subject)} cannot name a workload`);
    }

    logger.info({
      event: 'workload.ensure.start',
      component: 'workload.locator',
      message: 'Ensuring workload is running',
      user: subject
    });

    const current = await getUser(subject);
    if (!current.ok) {
      return current;
    }

    if (current.value && isReady(current.value)) {
      const location = toLocation({user: current.value, label});
      logger.info({
        event: 'workload.ensure.ready',
        component: 'workload.locator',
        message: 'Workload already running',
        workload: location.workloadName
      });
      return ok(location);
    }

    if (!current.value) {
      const created = await call({method: 'POST', path: userPath(subject), expected: [201, 409]});
      if (!created.ok) {
        return created;
      }
    }

    const pending = current.value ? defaultServerOf(current.value) : null;
    const alreadyStarting = pending !== null && pending !== 'running' && Boolean(pending.pending);
    if (!alreadyStarting) {
      const started = await call({method: 'POST', path: `${userPath(subject)}/server`, expected: [201, 202]});
      if (!started.ok) {
        return started;
      }
    }

    const ready = await waitUntilReady({subject, label});
    if (ready.ok) {
      logger.info({
        event: 'workload.ensure.ready',
        component: 'workload.locator',
        message: 'Workload became ready',
        workload: ready.value.workloadName
      });
    }

    return ready;
  };

  const stop: WorkloadLocator['stop'] = async subject => {
    const stopped = await call({method: 'DELETE', path: `${userPath(subject)}/server`, expected: [202, 204]});
    if (!stopped.ok) {
      return stopped;
    }

    return ok(undefined);
  };

  return {ensureRunning, stop};
};
