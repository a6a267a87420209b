/* eslint-disable prettier/prettier */
import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsString } from 'class-validator';

export class LoginDto {
  @ApiProperty()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsString({ message: 'Email o contraseña incorrectos' })
  @IsNotEmpty({ message: 'Email o contraseña incorrectos' })
  email!: string;

  @ApiProperty()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString({ message: 'Email o contraseña incorrectos' })
  @IsNotEmpty({ message: 'Email o contraseña incorrectos' })
  password!: string;
}
