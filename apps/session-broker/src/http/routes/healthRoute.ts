import {HealthResponseSchema} from '@tunnel-broker/schemas'

import {sendContract} from '../../http'
import type {SessionBrokerRouteLogicHandler} from './types'

export const handleHealthRoute: SessionBrokerRouteLogicHandler = ({response, correlationId, runtime}) => {
  sendContract({
    response,
    correlationId,
    schema: HealthResponseSchema,
    payload: {status: 'healthy', timestamp: Math.floor(runtime.now().getTime() / 1000)}
  })
}
