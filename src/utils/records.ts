/** Reads an own entry of a lookup record; inherited members such as `toString` count as absent. */
export function ownValue(values: Record<string, number>, key: string): number | undefined {
  return Object.hasOwn(values, key) ? values[key] : undefined;
}
