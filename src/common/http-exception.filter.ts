import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  ForbiddenException,
  HttpException,
  HttpStatus,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import type { Response } from 'express';
import { EntityNotFoundError, QueryFailedError } from 'typeorm';

export type ErrorBody = { code: string; message: string; details?: unknown };

function responseMessage(response: string | object, fallback: string): string {
  if (typeof response === 'string') return response;
  if ('message' in response) {
    const m = response.message;
    if (Array.isArray(m)) return m.join('; ');
    if (typeof m === 'string') return m;
  }
  return fallback;
}

// Códigos de violación de constraint: postgres (SQLSTATE) y sqlite (tests)
function driverCode(error: QueryFailedError): string {
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    return String(driverError.code);
  }
  return '';
}

@Catch()
export class GlobalHttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalHttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const [status, body] = this.toBody(exception);
    if (status >= 500) {
      this.logger.error(body.message, exception instanceof Error ? exception.stack : undefined);
    }
    res.status(status).json(body);
  }

  toBody(exception: unknown): [number, ErrorBody] {
    if (exception instanceof BadRequestException) {
      const response = exception.getResponse();
      return [
        HttpStatus.BAD_REQUEST,
        { code: 'BAD_REQUEST', message: responseMessage(response, 'Bad request'), details: response },
      ];
    }
    if (exception instanceof UnauthorizedException) {
      return [HttpStatus.UNAUTHORIZED, { code: 'UNAUTHORIZED', message: exception.message || 'Unauthorized' }];
    }
    if (exception instanceof ForbiddenException) {
      return [HttpStatus.FORBIDDEN, { code: 'FORBIDDEN', message: exception.message || 'Forbidden' }];
    }
    if (exception instanceof NotFoundException) {
      return [HttpStatus.NOT_FOUND, { code: 'NOT_FOUND', message: exception.message || 'Not found' }];
    }
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const response = exception.getResponse();
      return [status, { code: 'HTTP_' + status, message: responseMessage(response, exception.message), details: response }];
    }
    if (exception instanceof EntityNotFoundError) {
      return [HttpStatus.NOT_FOUND, { code: 'NOT_FOUND', message: 'Registro no encontrado' }];
    }
    if (exception instanceof QueryFailedError) {
      const code = driverCode(exception);
      if (code === '23505' || code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
        return [HttpStatus.CONFLICT, { code: 'CONFLICT', message: 'Registro duplicado (restricción de unicidad)' }];
      }
      if (code === '23503' || code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
        return [HttpStatus.BAD_REQUEST, { code: 'INVALID_REFERENCE', message: 'Referencia a registro inexistente' }];
      }
      if (code === '23502' || code === 'SQLITE_CONSTRAINT_NOTNULL') {
        return [HttpStatus.BAD_REQUEST, { code: 'MISSING_FIELD', message: 'Falta un campo obligatorio' }];
      }
    }
    const message = exception instanceof Error ? exception.message : 'Unexpected error';
    return [HttpStatus.INTERNAL_SERVER_ERROR, { code: 'INTERNAL_ERROR', message: message || 'Unexpected error' }];
  }
}
