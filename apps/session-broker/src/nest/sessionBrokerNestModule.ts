import {type DynamicModule, Module} from '@nestjs/common'

import {createSessionBrokerRouteHandlers} from '../http/requestHandler'
import type {RouteRuntime} from '../http/routes/types'
import {AuthController} from './controllers/authController'
import {FallbackController} from './controllers/fallbackController'
import {HealthController} from './controllers/healthController'
import {SessionController} from './controllers/sessionController'
import {SESSION_BROKER_ROUTE_HANDLERS, SESSION_BROKER_ROUTE_RUNTIME} from './tokens'

// FallbackController is registered last so its wildcard only sees unmatched paths.
@Module({
  controllers: [HealthController, AuthController, SessionController, FallbackController]
})
export class SessionBrokerNestModule {
  public static register({runtime}: {runtime: RouteRuntime}): DynamicModule {
    return {
      module: SessionBrokerNestModule,
      providers: [
        {
          provide: SESSION_BROKER_ROUTE_RUNTIME,
          useValue: runtime
        },
        {
          provide: SESSION_BROKER_ROUTE_HANDLERS,
          inject: [SESSION_BROKER_ROUTE_RUNTIME],
          useFactory: (routeRuntime: RouteRuntime) => createSessionBrokerRouteHandlers({runtime: routeRuntime})
        }
      ]
    }
  }
}
