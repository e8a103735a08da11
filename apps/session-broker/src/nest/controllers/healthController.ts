import type {IncomingMessage, ServerResponse} from 'node:http'

import {Controller, Get, Inject, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {SessionBrokerRouteHandlers} from '../../http/routes/types'
import {SESSION_BROKER_ROUTE_HANDLERS} from '../tokens'

@Controller()
export class HealthController {
  public constructor(
    @Inject(SESSION_BROKER_ROUTE_HANDLERS) private readonly routeHandlers: SessionBrokerRouteHandlers
  ) {}

  @Get('/health')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.health(request as unknown as IncomingMessage, response as unknown as ServerResponse)
  }
}
