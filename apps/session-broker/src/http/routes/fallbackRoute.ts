import {notFound} from '../../errors'
import type {SessionBrokerRouteLogicHandler} from './types'

export const handleFallbackRoute: SessionBrokerRouteLogicHandler = ({method, pathname}) => {
  throw notFound('route_not_found', `Unsupported route ${method} ${pathname}`)
}
