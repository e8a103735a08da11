import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

export const LogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    session_id: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    workload: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const storage = new AsyncLocalStorage<LogContext>();

/** Runs `operation` with `fields` layered over the context already in scope, if any. */
export const runWithLogContext = <T>(fields: LogContext, operation: () => T): T =>
  storage.run({...storage.getStore(), ...LogContextSchema.parse(fields)}, operation);

export const getLogContext = (): LogContext | undefined => storage.getStore();

export const setLogContextFields = (fields: LogContext): LogContext | undefined => {
  const active = storage.getStore();
  if (active) {
    Object.assign(active, LogContextSchema.parse(fields));
  }

  return active;
};
