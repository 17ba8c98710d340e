/**
 * A row read from a tabular record source
 *
 * Field values are scalars or arrays of scalars, as returned by a SQL-like
 * query. Records are consumed once per embedding run.
 */
export type FieldScalar = string | number | boolean | bigint | Date | null;

export type FieldValue = FieldScalar | FieldScalar[];

export type SourceRecord = Readonly<Record<string, FieldValue | undefined>>;

/**
 * Whether a field value counts as present for projection purposes
 * (`null`, `undefined` and the empty string do not)
 */
export function isPresent<T>(value: T | null | undefined | ''): value is T {
  return value !== null && value !== undefined && value !== '';
}

/**
 * String form of a scalar, as used for text and restrict tokens
 */
export function stringifyScalar(value: Exclude<FieldScalar, null>): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}
