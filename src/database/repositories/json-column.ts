/** jsonb columns take serialized text; an empty object is stored as null. */
export function toJsonColumn(
  value: Record<string, unknown> | null | undefined,
): string | null {
  if (!value || Object.keys(value).length === 0) {
    return null;
  }
  return JSON.stringify(value);
}
