import {z} from 'zod';

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;

export type WorkloadLocation = {
  workloadName: string;
  namespace: string;
  container?: string;
  status: 'running';
};

export type WorkloadNaming = {
  workloadNameTemplate: string;
  namespaceTemplate: string;
  container?: string;
};

const serverModelSchema = z
  .object({
    name: z.string().optional(),
    ready: z.boolean().default(false),
    pending: z.string().nullable().optional(),
    state: z
      .object({
        pod_name: z.string().min(1).optional(),
        namespace: z.string().min(1).optional()
      })
      .loose()
      .nullable()
      .optional()
  })
  .loose();

export type OrchestratorServer = z.infer<typeof serverModelSchema>;

export const orchestratorUserSchema = z
  .object({
    name: z.string().min(1),
    server: z.union([z.string(), serverModelSchema]).nullable().optional(),
    servers: z.record(z.string(), serverModelSchema).optional()
  })
  .loose();

export type OrchestratorUser = z.infer<typeof orchestratorUserSchema>;
