/* eslint-disable prettier/prettier */
import { HttpException, HttpStatus } from '@nestjs/common';
import { FlashCategory } from '../flash/flash.util';

/**
 * Base for every error the user should see as a notice on the next page.
 * `redirectTo` is filled by FlashErrorsInterceptor from the route's
 * @OnErrorRedirect() target unless the exception fixes its own.
 */
export class FlashException extends HttpException {
  redirectTo?: string;

  constructor(
    message: string,
    readonly category: FlashCategory,
    status: HttpStatus = HttpStatus.BAD_REQUEST,
    redirectTo?: string,
  ) {
    super(message, status);
    this.name = 'FlashException';
    this.redirectTo = redirectTo;
  }
}

export class FormValidationException extends FlashException {
  constructor(message: string, redirectTo?: string) {
    super(message, 'danger', HttpStatus.BAD_REQUEST, redirectTo);
    this.name = 'FormValidationException';
  }
}

export class UnexpectedErrorException extends FlashException {
  constructor(redirectTo?: string) {
    super(
      'Ocurrió un error interno. Intenta de nuevo.',
      'danger',
      HttpStatus.INTERNAL_SERVER_ERROR,
      redirectTo,
    );
    this.name = 'UnexpectedErrorException';
  }
}
