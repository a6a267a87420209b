/** Submitted value per field id, as posted by the record forms. */
export type ValuesByFieldId = ReadonlyMap<number, string>;

const FIELD_KEY = /^field_(\d+)$/;

/**
 * Collects the `field_<id>` entries of a form body. Values are kept as
 * posted; deciding what counts as empty belongs to the service.
 */
export function extractFieldValues(body: Record<string, unknown>): ValuesByFieldId {
  const values = new Map<number, string>();

  for (const [key, value] of Object.entries(body ?? {})) {
    const match = FIELD_KEY.exec(key);
    if (!match) continue;

    // Repeated inputs arrive as arrays; the last one wins
    const posted = Array.isArray(value) ? value[value.length - 1] : value;
    if (typeof posted === 'string') {
      values.set(Number(match[1]), posted);
    }
  }

  return values;
}
