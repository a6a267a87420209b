/* eslint-disable prettier/prettier */
import {
  BadRequestException,
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Observable, throwError } from 'rxjs';
import { catchError } from 'rxjs/operators';
import { ON_ERROR_REDIRECT_KEY } from '../decorators/on-error-redirect.decorator';
import {
  FlashException,
  FormValidationException,
  UnexpectedErrorException,
} from '../exceptions/flash.exception';

@Injectable()
export class FlashErrorsInterceptor implements NestInterceptor {
  private readonly logger = new Logger(FlashErrorsInterceptor.name);

  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const fallback = this.reflector.getAllAndOverride<string | undefined>(
      ON_ERROR_REDIRECT_KEY,
      [context.getHandler(), context.getClass()],
    );

    // Routes without a fallback page keep the JSON error responses.
    if (!fallback) {
      return next.handle();
    }

    return next.handle().pipe(
      catchError((error: unknown) =>
        throwError(() => this.toFlashException(error, fallback, context)),
      ),
    );
  }

  private toFlashException(
    error: unknown,
    fallback: string,
    context: ExecutionContext,
  ): HttpException {
    if (error instanceof FlashException) {
      if (!error.redirectTo) {
        error.redirectTo = fallback;
      }
      return error;
    }

    if (error instanceof BadRequestException) {
      return new FormValidationException(error.message, fallback);
    }

    if (error instanceof HttpException) {
      return error;
    }

    const request = context.switchToHttp().getRequest<Request>();
    this.logger.error(
      `Unexpected error on ${request.method} ${request.url}`,
      error instanceof Error ? error.stack : String(error),
    );
    return new UnexpectedErrorException(fallback);
  }
}
