import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { Request, Response } from 'express';
import { DomainError, ErrorKind } from '../errors';

export interface DomainErrorResponse {
  statusCode: number;
  error: string;
  code: string;
  message: string;
  retryable: boolean;
  timestamp: string;
  path: string;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  input: HttpStatus.BAD_REQUEST,
  validation: HttpStatus.UNPROCESSABLE_ENTITY,
  upstream: HttpStatus.SERVICE_UNAVAILABLE,
  state: HttpStatus.CONFLICT,
};

@Catch(DomainError)
export class DomainExceptionFilter implements ExceptionFilter {
  catch(exception: DomainError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body: DomainErrorResponse = {
      statusCode: STATUS_BY_KIND[exception.kind],
      error: exception.name,
      code: exception.code,
      message: exception.message,
      retryable: exception.retryable,
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    response.status(body.statusCode).json(body);
  }
}
