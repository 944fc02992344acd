import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ApiError } from '../errors/api-errors.js';
import { AppConfigService } from '../../config/app-config.service.js';

export interface ErrorBody {
  code: string;
  message: string;
  details: Record<string, unknown> | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  constructor(private readonly configService: AppConfigService) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const { status, body } = this.toResponse(exception);
    res.status(status).json(body);
  }

  toResponse(exception: unknown): { status: number; body: ErrorBody } {
    if (exception instanceof ApiError) {
      if (exception.httpStatus >= 500) {
        this.logger.error(`${exception.code}: ${exception.message}`);
      }
      return {
        status: exception.httpStatus,
        body: {
          code: exception.code,
          message: exception.message,
          details: exception.details ?? null,
        },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      const message =
        typeof body === 'string'
          ? body
          : isRecord(body) && typeof body.message === 'string'
            ? body.message
            : exception.message;
      return {
        status,
        body: {
          code: 'HTTP_ERROR',
          message,
          details: isRecord(body) ? body : null,
        },
      };
    }

    const error =
      exception instanceof Error ? exception : new Error(String(exception));
    this.logger.error(error.message, error.stack);
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        code: 'INTERNAL_ERROR',
        message: this.configService.isProduction()
          ? 'Internal server error'
          : error.message,
        details: null,
      },
    };
  }
}
