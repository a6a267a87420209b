/* eslint-disable prettier/prettier */
import { HttpStatus } from '@nestjs/common';
import { FlashException } from '../../common/exceptions/flash.exception';

/**
 * The store file named by the session is missing or cannot be opened.
 */
export class StoreUnavailableException extends FlashException {
  constructor(redirectTo?: string) {
    super('Base de datos no disponible', 'danger', HttpStatus.SERVICE_UNAVAILABLE, redirectTo);
    this.name = 'StoreUnavailableException';
  }
}

export class RegistroNotFoundException extends FlashException {
  constructor(id: number) {
    super(`Registro ${id} no encontrado`, 'warning', HttpStatus.NOT_FOUND);
    this.name = 'RegistroNotFoundException';
  }
}
