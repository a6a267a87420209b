/* eslint-disable prettier/prettier */
import { HttpStatus } from '@nestjs/common';
import { FlashException } from '../../common/exceptions/flash.exception';

export class DuplicateEmailException extends FlashException {
  constructor() {
    super('El correo ya está registrado.', 'warning', HttpStatus.CONFLICT);
    this.name = 'DuplicateEmailException';
  }
}

/**
 * Same message whether the email is unknown or the password is wrong.
 */
export class InvalidCredentialsException extends FlashException {
  constructor() {
    super('Email o contraseña incorrectos', 'danger', HttpStatus.UNAUTHORIZED, '/login');
    this.name = 'InvalidCredentialsException';
  }
}

export class UnauthenticatedException extends FlashException {
  constructor() {
    super('Inicia sesión primero', 'warning', HttpStatus.UNAUTHORIZED, '/login');
    this.name = 'UnauthenticatedException';
  }
}
