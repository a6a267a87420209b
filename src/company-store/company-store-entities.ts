/**
 * Entities that live in each company's own store file (never in users.db).
 */
import { CampoEntity } from '../campos/entities/campo.entity';
import { RegistroEntity } from '../registros/entities/registro.entity';
import { ValorEntity } from '../registros/entities/valor.entity';

export const COMPANY_STORE_ENTITIES = [CampoEntity, RegistroEntity, ValorEntity];
