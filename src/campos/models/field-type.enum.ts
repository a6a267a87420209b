/* eslint-disable prettier/prettier */
export enum FieldType {
  TEXT = 'text',
  NUMBER = 'number',
  DATE = 'date',
  EMAIL = 'email',
}

/** HTML input type used to render each field type in the record forms. */
export const FIELD_INPUT_TYPES: Record<FieldType, string> = {
  [FieldType.TEXT]: 'text',
  [FieldType.NUMBER]: 'number',
  [FieldType.DATE]: 'date',
  [FieldType.EMAIL]: 'email',
};

const FIELD_TYPE_VALUES: readonly string[] = Object.values(FieldType);

export function isFieldType(value: string): value is FieldType {
  return FIELD_TYPE_VALUES.includes(value);
}
