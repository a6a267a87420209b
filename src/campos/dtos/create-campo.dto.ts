/* eslint-disable prettier/prettier */
import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEnum, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { FieldType } from '../models/field-type.enum';

export class CreateCampoDto {
  @ApiProperty({ example: 'proveedor' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString({ message: 'Nombre requerido' })
  @IsNotEmpty({ message: 'Nombre requerido' })
  @MaxLength(100, { message: 'El nombre no puede superar 100 caracteres' })
  nombre!: string;

  @ApiProperty({ enum: FieldType, default: FieldType.TEXT })
  @Transform(({ value }) =>
    typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : FieldType.TEXT,
  )
  @IsEnum(FieldType, { message: `Tipo de campo no válido. Usa: ${Object.values(FieldType).join(', ')}` })
  tipo: FieldType = FieldType.TEXT;
}
