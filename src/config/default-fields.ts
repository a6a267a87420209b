import { FieldType, isFieldType } from '../campos/models/field-type.enum';

export interface DefaultField {
  nombre: string;
  tipo: FieldType;
}

export const DEFAULT_FIELDS_SETTING = 'descripcion:text,comprador:text,costo:number';

/**
 * Parses the `DEFAULT_FIELDS` setting, a comma separated list of `nombre:tipo`
 * pairs. A missing type means `text`. Blank entries are skipped, and a
 * repeated name keeps its first entry.
 */
export function parseDefaultFields(setting: string): DefaultField[] {
  const fields = new Map<string, DefaultField>();

  for (const entry of setting.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const [rawNombre, rawTipo = FieldType.TEXT] = trimmed.split(':');
    const nombre = rawNombre.trim();
    const tipo = rawTipo.trim().toLowerCase();

    if (!nombre) {
      throw new Error(`Invalid DEFAULT_FIELDS entry "${trimmed}": missing field name`);
    }
    if (!isFieldType(tipo)) {
      throw new Error(
        `Invalid DEFAULT_FIELDS entry "${trimmed}": type must be one of ${Object.values(FieldType).join(', ')}`,
      );
    }
    if (!fields.has(nombre)) {
      fields.set(nombre, { nombre, tipo });
    }
  }

  return [...fields.values()];
}
