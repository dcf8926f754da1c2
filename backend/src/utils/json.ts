/** Shallow copy of a flat record with bigint values turned into decimal strings. */
export function toJsonRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, typeof entry === 'bigint' ? entry.toString() : entry]),
  );
}
