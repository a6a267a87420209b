/* eslint-disable prettier/prettier */
import { CreateDateColumn, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { ValorEntity } from './valor.entity';

@Entity('registros')
export class RegistroEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @CreateDateColumn({ name: 'creado_at' })
  creadoAt!: Date;

  @OneToMany(() => ValorEntity, (valor) => valor.registro)
  valores?: ValorEntity[];
}
