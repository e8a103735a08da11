import type {IncomingMessage, ServerResponse} from 'node:http'

import {Controller, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {SessionBrokerRouteHandlers} from '../../http/routes/types'
import {SESSION_BROKER_ROUTE_HANDLERS} from '../tokens'

@Controller('/auth')
export class AuthController {
  public constructor(
    @Inject(SESSION_BROKER_ROUTE_HANDLERS) private readonly routeHandlers: SessionBrokerRouteHandlers
  ) {}

  @Get('/start')
  public async start(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.authStart(request as unknown as IncomingMessage, response as unknown as ServerResponse)
  }

  @Get('/callback')
  public async callback(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.authCallback(request as unknown as IncomingMessage, response as unknown as ServerResponse)
  }

  @Post('/refresh')
  public async refresh(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.authRefresh(request as unknown as IncomingMessage, response as unknown as ServerResponse)
  }
}
