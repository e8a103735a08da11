import type {IncomingMessage, ServerResponse} from 'node:http'

import {Controller, Delete, Get, Inject, Post, Req, Res} from '@nestjs/common'
import type {Request, Response} from 'express'

import type {SessionBrokerRouteHandlers} from '../../http/routes/types'
import {SESSION_BROKER_ROUTE_HANDLERS} from '../tokens'

@Controller('/session')
export class SessionController {
  public constructor(
    @Inject(SESSION_BROKER_ROUTE_HANDLERS) private readonly routeHandlers: SessionBrokerRouteHandlers
  ) {}

  @Post()
  public async create(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.sessionCreate(request as unknown as IncomingMessage, response as unknown as ServerResponse)
  }

  @Get('/:id')
  public async get(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.sessionGet(request as unknown as IncomingMessage, response as unknown as ServerResponse)
  }

  @Delete('/:id')
  public async remove(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.sessionDelete(request as unknown as IncomingMessage, response as unknown as ServerResponse)
  }

  @Post('/:id/token')
  public async reissueToken(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.routeHandlers.sessionToken(request as unknown as IncomingMessage, response as unknown as ServerResponse)
  }
}
