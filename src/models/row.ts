/**
 * Row - one logical record from a source file.
 *
 * Field values are raw strings. `null` is the explicit absence marker: a CSV
 * record shorter than its header, a JSON key that is missing or null.
 */

export type FieldValue = string | null;

export interface Row {
  /** 1-based, per source file */
  row_number: number;
  fields: Readonly<Record<string, FieldValue>>;
}

/**
 * Look up a field, treating a key the row does not carry as absent.
 */
export function getField(row: Row, name: string): FieldValue {
  return Object.prototype.hasOwnProperty.call(row.fields, name) ? (row.fields[name] ?? null) : null;
}

/**
 * Absent or empty after trim
 */
export function isBlank(value: FieldValue): boolean {
  return value === null || value.trim() === '';
}
