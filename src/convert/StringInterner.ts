/** Property keys that recur in nearly every symbol. */
const PROPERTY_KEYS = [
  "Value",
  "Reference",
  "Footprint",
  "Datasheet",
  "Description",
  "ki_keywords",
  "ki_description",
  "ki_fp_filters",
  "ki_locked",
  "D",
  "in_bom",
  "on_board",
  "pin_numbers",
  "power",
  "extends",
] as const;

let propertyKeyTable: ReadonlyMap<string, string> | null = null;

// Built on first use and never written again.
function getPropertyKeyTable(): ReadonlyMap<string, string> {
  if (propertyKeyTable) return propertyKeyTable;
  propertyKeyTable = new Map(PROPERTY_KEYS.map((key): [string, string] => [key, key]));
  return propertyKeyTable;
}

/**
 * Returns the shared instance of a well-known property key, or the key itself
 * for anything else. Has no effect on equality or output.
 */
export function internPropertyKey(key: string): string {
  return getPropertyKeyTable().get(key) ?? key;
}

export function isInternedPropertyKey(key: string): boolean {
  return getPropertyKeyTable().has(key);
}

export function internedKeyCount(): number {
  return getPropertyKeyTable().size;
}
