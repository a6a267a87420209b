import { CreateCampoDto } from '../../campos/dtos/create-campo.dto';
import { FieldType } from '../../campos/models/field-type.enum';
import { FormValidationException } from '../exceptions/flash.exception';
import { createFormValidationPipe, firstValidationMessage } from './form-validation.pipe';

describe('firstValidationMessage', () => {
  it('returns the first constraint, looking into nested errors', () => {
    expect(
      firstValidationMessage([
        { property: 'outer', children: [{ property: 'inner', constraints: { isNotEmpty: 'inner required' } }] },
        { property: 'other', constraints: { isString: 'other must be text' } },
      ]),
    ).toBe('inner required');
  });

  it('returns an empty string when nothing failed', () => {
    expect(firstValidationMessage([])).toBe('');
  });
});

describe('createFormValidationPipe', () => {
  const pipe = createFormValidationPipe();

  it('turns a failed constraint into a form notice', async () => {
    const error = await pipe
      .transform({ nombre: '   ' }, { type: 'body', metatype: CreateCampoDto })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FormValidationException);
    expect(error).toMatchObject({ message: 'Nombre requerido', category: 'danger' });
  });

  it('trims names and normalises the field type', async () => {
    const dto = await pipe.transform(
      { nombre: ' proveedor ', tipo: 'NUMBER' },
      { type: 'body', metatype: CreateCampoDto },
    );

    expect(dto).toBeInstanceOf(CreateCampoDto);
    expect(dto).toEqual(expect.objectContaining({ nombre: 'proveedor', tipo: FieldType.NUMBER }));
  });

  it('defaults the type to text', async () => {
    const dto = await pipe.transform({ nombre: 'notas' }, { type: 'body', metatype: CreateCampoDto });

    expect(dto).toEqual(expect.objectContaining({ nombre: 'notas', tipo: FieldType.TEXT }));
  });

  it('rejects types outside the closed set', async () => {
    const error = await pipe
      .transform({ nombre: 'notas', tipo: 'texto' }, { type: 'body', metatype: CreateCampoDto })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({
      message: 'Tipo de campo no válido. Usa: text, number, date, email',
    });
  });
});
