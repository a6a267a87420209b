/* eslint-disable prettier/prettier */
import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { CampoEntity } from '../../campos/entities/campo.entity';
import { RegistroEntity } from './registro.entity';

/** One (registro, campo) -> text association. Only non-empty values are stored. */
@Entity('valores')
export class ValorEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'registro_id', type: 'integer' })
  registroId!: number;

  @Column({ name: 'campo_id', type: 'integer' })
  campoId!: number;

  @Column({ type: 'text', nullable: true })
  valor!: string | null;

  @ManyToOne(() => RegistroEntity, (registro) => registro.valores)
  @JoinColumn({ name: 'registro_id' })
  registro?: RegistroEntity;

  @ManyToOne(() => CampoEntity, (campo) => campo.valores)
  @JoinColumn({ name: 'campo_id' })
  campo?: CampoEntity;
}
