import {
  All,
  BadRequestException,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Inject,
  InternalServerErrorException,
  Logger,
  NotAcceptableException,
  NotFoundException,
  Req,
  UnauthorizedException,
  UseFilters,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Request } from 'express';
import {
  DispatchResult,
  DispatchStatus,
  HookDispatcher,
  SIGNATURE_HEADER,
} from '../../../core';
import { ApiHookDispatch } from '../../../_shared';
import { HOOK_DISPATCHER } from '../constants';
import { EmptyBodyExceptionFilter } from '../filters/empty-body-exception.filter';

/**
 * Dispatch Controller
 *
 * Single catch-all route: every method and path goes to the dispatcher,
 * with the untouched request stream as the body.
 */
@ApiTags('Dispatch')
@Controller()
@UseFilters(EmptyBodyExceptionFilter)
export class DispatchController {
  private readonly logger = new Logger(DispatchController.name);

  constructor(
    @Inject(HOOK_DISPATCHER)
    private readonly dispatcher: HookDispatcher,
  ) {}

  @All('*')
  @HttpCode(HttpStatus.OK)
  @ApiHookDispatch()
  async dispatch(@Req() request: Request): Promise<void> {
    const result = await this.dispatcher.dispatch({
      path: request.path,
      signatureHeader: firstValue(request.headers[SIGNATURE_HEADER]),
      body: request,
    });

    this.logger.debug(
      `[${result.dispatchId}] ${request.method} ${request.path} → ${result.status}`,
    );

    const exception = toHttpException(result);
    if (exception) {
      throw exception;
    }
  }
}

function firstValue(header: string | string[] | undefined): string | undefined {
  return Array.isArray(header) ? header[0] : header;
}

function toHttpException(result: DispatchResult): HttpException | undefined {
  switch (result.status) {
    case DispatchStatus.ACCEPTED:
      return undefined;
    case DispatchStatus.NOT_FOUND:
      return new NotFoundException();
    case DispatchStatus.UNAUTHORIZED:
      return new UnauthorizedException();
    case DispatchStatus.MALFORMED_SIGNATURE:
      return new BadRequestException();
    case DispatchStatus.UNSUPPORTED_ALGORITHM:
      return new NotAcceptableException();
    case DispatchStatus.LAUNCH_FAILED:
      return new InternalServerErrorException(undefined, { cause: result.error });
  }
}
