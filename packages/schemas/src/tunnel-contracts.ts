import {z} from 'zod'

export const TunnelMessageTypeSchema = z.enum([
  'exec',
  'exec_response',
  'portforward',
  'portforward_response',
  'file',
  'file_response',
  'error'
])

export type TunnelMessageType = z.infer<typeof TunnelMessageTypeSchema>

export const TunnelEnvelopeSchema = z
  .object({
    type: z.string().min(1),
    payload: z.unknown().optional()
  })
  .loose()

export type TunnelEnvelope = z.infer<typeof TunnelEnvelopeSchema>

const requestIdSchema = z.string().min(1).max(128).optional()

export const ExecRequestSchema = z
  .object({
    request_id: requestIdSchema,
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    stdin: z.string().optional(),
    stdout: z.boolean().default(true),
    stderr: z.boolean().default(true)
  })
  .loose()

export type ExecRequest = z.infer<typeof ExecRequestSchema>

export type ExecResponsePayload =
  | {request_id?: string; stream: 'stdout' | 'stderr'; data: string}
  | {request_id?: string; exit_code: number; done: true}

export const FileOperationSchema = z.enum(['read', 'write', 'list', 'delete'])

export type FileOperation = z.infer<typeof FileOperationSchema>

export const FileRequestSchema = z
  .object({
    request_id: requestIdSchema,
    operation: FileOperationSchema,
    path: z.string().min(1).max(4096),
    content: z.string().optional()
  })
  .loose()
  .refine(value => value.operation !== 'write' || value.content !== undefined, {
    message: 'write requires content',
    path: ['content']
  })

export type FileRequest = z.infer<typeof FileRequestSchema>

export type FileResponsePayload = {
  request_id?: string
  success: boolean
  content?: string
  error?: string
}

const forwardIdSchema = z.string().min(1).max(64)

const portSchema = z.number().int().gte(1).lte(65535)

export const PortForwardRequestSchema = z.preprocess(
  value => {
    if (typeof value === 'object' && value !== null && !Array.isArray(value) && !('action' in value)) {
      return {...value, action: 'open'}
    }

    return value
  },
  z.discriminatedUnion('action', [
    z
      .object({
        action: z.literal('open'),
        port: portSchema,
        forward_id: forwardIdSchema.optional()
      })
      .loose(),
    z
      .object({
        action: z.literal('data'),
        forward_id: forwardIdSchema,
        data: z.string().base64()
      })
      .loose(),
    z
      .object({
        action: z.literal('close'),
        forward_id: forwardIdSchema
      })
      .loose()
  ])
)

export type PortForwardRequest = z.infer<typeof PortForwardRequestSchema>

export type PortForwardResponsePayload =
  | {forward_id: string; action: 'opened'; port: number}
  | {forward_id: string; action: 'data'; data: string}
  | {forward_id: string; action: 'closed'; reason?: string}

export const TunnelErrorCodeSchema = z.enum([
  'message_invalid',
  'message_type_unknown',
  'exec_failed',
  'portforward_failed',
  'portforward_unknown',
  'session_ended',
  'idle_timeout',
  'internal_error'
])

export type TunnelErrorCode = z.infer<typeof TunnelErrorCodeSchema>

export type TunnelErrorPayload = {
  code: TunnelErrorCode
  message: string
  request_id?: string
  forward_id?: string
}

export type OutboundTunnelMessage =
  | {type: 'exec_response'; payload: ExecResponsePayload}
  | {type: 'file_response'; payload: FileResponsePayload}
  | {type: 'portforward_response'; payload: PortForwardResponsePayload}
  | {type: 'error'; payload: TunnelErrorPayload}
