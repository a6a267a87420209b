/* eslint-disable prettier/prettier */
import { CampoEntity } from '../../campos/entities/campo.entity';
import { FIELD_INPUT_TYPES } from '../../campos/models/field-type.enum';

/** A record with its values keyed by field name. Fields without a value are absent. */
export interface RegistroWithValues {
  id: number;
  creadoAt: Date;
  valores: Record<string, string>;
}

export interface RegistroRow {
  id: number;
  creadoAt: string;
  celdas: string[];
}

export interface FormField {
  id: number;
  nombre: string;
  tipo: string;
  inputType: string;
  inputName: string;
  valor: string;
}

export function formatTimestamp(date: Date): string {
  return Number.isNaN(date.getTime()) ? '' : date.toISOString().slice(0, 19).replace('T', ' ');
}

/** Table rows with one cell per field, in field order. */
export function toRegistroRows(campos: CampoEntity[], registros: RegistroWithValues[]): RegistroRow[] {
  return registros.map((registro) => ({
    id: registro.id,
    creadoAt: formatTimestamp(registro.creadoAt),
    celdas: campos.map((campo) => registro.valores[campo.nombre] ?? ''),
  }));
}

export function toFormFields(campos: CampoEntity[], valores: ReadonlyMap<number, string> = new Map()): FormField[] {
  return campos.map((campo) => ({
    id: campo.id,
    nombre: campo.nombre,
    tipo: campo.tipo,
    inputType: FIELD_INPUT_TYPES[campo.tipo] ?? 'text',
    inputName: `field_${campo.id}`,
    valor: valores.get(campo.id) ?? '',
  }));
}
