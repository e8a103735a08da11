import {describe, expect, it} from 'vitest'

import {ExecRequestSchema, FileRequestSchema, PortForwardRequestSchema, TunnelEnvelopeSchema} from '../index'

describe('tunnel contracts', () => {
  it('fills exec defaults', () => {
    expect(ExecRequestSchema.parse({command: 'ls'})).toEqual({command: 'ls', args: [], stdout: true, stderr: true})
  })

  it('treats a port forward without an action as an open', () => {
    expect(PortForwardRequestSchema.parse({port: 8888})).toEqual({action: 'open', port: 8888})
    expect(PortForwardRequestSchema.safeParse({port: 70000}).success).toBe(false)
  })

  it('requires base64 data and a forward id for forwarded chunks', () => {
    expect(PortForwardRequestSchema.parse({action: 'data', forward_id: 'f1', data: 'aGk='})).toEqual({
      action: 'data',
      forward_id: 'f1',
      data: 'aGk='
    })
    expect(PortForwardRequestSchema.safeParse({action: 'data', data: 'aGk='}).success).toBe(false)
    expect(PortForwardRequestSchema.safeParse({action: 'data', forward_id: 'f1', data: 'not base64!'}).success).toBe(
      false
    )
  })

  it('rejects a file write without content', () => {
    const missing = FileRequestSchema.safeParse({operation: 'write', path: '/home/jovyan/a.txt'})

    expect(missing.success).toBe(false)
    expect(missing.error?.issues[0]?.message).toBe('write requires content')
    expect(FileRequestSchema.safeParse({operation: 'write', path: '/home/jovyan/a.txt', content: ''}).success).toBe(
      true
    )
  })

  it('accepts envelopes with unknown types for later dispatch', () => {
    expect(TunnelEnvelopeSchema.parse({type: 'shell'})).toEqual({type: 'shell'})
    expect(TunnelEnvelopeSchema.safeParse({payload: {}}).success).toBe(false)
  })
})
