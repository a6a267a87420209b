import { CampoEntity } from '../../campos/entities/campo.entity';
import { FieldType } from '../../campos/models/field-type.enum';
import { formatTimestamp, toFormFields, toRegistroRows } from './registro-view.model';

function campo(id: number, nombre: string, tipo: FieldType): CampoEntity {
  return Object.assign(new CampoEntity(), { id, nombre, tipo });
}

describe('registro view models', () => {
  const campos = [campo(1, 'descripcion', FieldType.TEXT), campo(3, 'costo', FieldType.NUMBER)];

  it('formats timestamps without the time zone suffix', () => {
    expect(formatTimestamp(new Date('2024-05-01T10:20:30.000Z'))).toBe('2024-05-01 10:20:30');
    expect(formatTimestamp(new Date('not a date'))).toBe('');
  });

  it('builds one cell per field in field order', () => {
    const rows = toRegistroRows(campos, [
      { id: 8, creadoAt: new Date('2024-05-01T10:20:30.000Z'), valores: { costo: '99' } },
    ]);

    expect(rows).toEqual([{ id: 8, creadoAt: '2024-05-01 10:20:30', celdas: ['', '99'] }]);
  });

  it('builds form inputs with the current values', () => {
    expect(toFormFields(campos, new Map([[3, '12.5']]))).toEqual([
      { id: 1, nombre: 'descripcion', tipo: 'text', inputType: 'text', inputName: 'field_1', valor: '' },
      { id: 3, nombre: 'costo', tipo: 'number', inputType: 'number', inputName: 'field_3', valor: '12.5' },
    ]);
  });
});
