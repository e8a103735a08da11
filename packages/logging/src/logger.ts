import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@tunnel-broker/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    session_id: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    workload: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: Omit<LogEventInput, 'level'>) => void;
  info: (input: Omit<LogEventInput, 'level'>) => void;
  warn: (input: Omit<LogEventInput, 'level'>) => void;
  error: (input: Omit<LogEventInput, 'level'>) => void;
  fatal: (input: Omit<LogEventInput, 'level'>) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const chooseStream = ({level, writer}: {level: EmittableLogLevel; writer: StructuredLogWriter}) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

const resolveContext = ({context, input}: {context: LogContext | undefined; input: LogEventInput}) => ({
  correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
  request_id: input.request_id ?? context?.request_id ?? 'n/a',
  session_id: input.session_id ?? context?.session_id,
  user: input.user ?? context?.user,
  workload: input.workload ?? context?.workload,
  route: input.route ?? context?.route,
  method: input.method ?? context?.method
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const createEnvelope = ({
  input,
  service,
  env,
  now,
  extraSensitiveKeys,
  context
}: {
  input: LogEventInput;
  service: string;
  env: string;
  now: () => Date;
  extraSensitiveKeys: string[];
  context: LogContext | undefined;
}): LogEvent => {
  const resolved = resolveContext({context, input});
  const sanitizedMetadata = sanitizeForLog({value: input.metadata ?? {}, extraSensitiveKeys});

  return LogEventSchema.parse({
    ts: now().toISOString(),
    level: input.level,
    service,
    env,
    event: input.event,
    component: input.component,
    correlation_id: resolved.correlation_id,
    request_id: resolved.request_id,
    ...(input.message ? {message: input.message} : {}),
    ...(resolved.session_id ? {session_id: resolved.session_id} : {}),
    ...(resolved.user ? {user: resolved.user} : {}),
    ...(resolved.workload ? {workload: resolved.workload} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(resolved.route ? {route: resolved.route} : {}),
    ...(resolved.method ? {method: resolved.method} : {}),
    metadata: isRecord(sanitizedMetadata) ? sanitizedMetadata : {}
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const level = LogLevelSchema.parse(options.level);
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const writer = options.writer ?? defaultWriter;
  const now = options.now ?? (() => new Date());
  const extraSensitiveKeys = options.extraSensitiveKeys ?? [];

  const log = (rawInput: LogEventInput) => {
    const parsed = LogEventInputSchema.safeParse(rawInput);
    if (!parsed.success) {
      return;
    }

    const input = parsed.data;
    if (LEVEL_ORDER[input.level] < LEVEL_ORDER[level]) {
      return;
    }

    try {
      const envelope = createEnvelope({input, service, env, now, extraSensitiveKeys, context: getLogContext()});
      chooseStream({level: input.level, writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch (error) {
      process.emitWarning(`log event ${input.event} dropped: ${error instanceof Error ? error.message : 'unknown'}`, {
        code: 'LOG_EVENT_DROPPED'
      });
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
