/* eslint-disable prettier/prettier */
import { Column, Entity, OneToMany, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { FieldType } from '../models/field-type.enum';
import { ValorEntity } from '../../registros/entities/valor.entity';

/** A user-defined attribute that every record of the company may carry. */
@Entity('campos')
@Unique(['nombre'])
export class CampoEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  nombre!: string;

  @Column({ type: 'simple-enum', enum: FieldType, default: FieldType.TEXT })
  tipo!: FieldType;

  @OneToMany(() => ValorEntity, (valor) => valor.campo)
  valores?: ValorEntity[];
}
