import { CategoryDefinition } from "../types";

const MAIN_CATEGORIES: ReadonlyArray<[string, number]> = [
  ["byty", 1],
  ["domy", 2],
  ["pozemky", 3],
  ["komercni", 4],
  ["ostatni", 5]
];

const DEAL_TYPES: ReadonlyArray<[string, number]> = [
  ["prodej", 1],
  ["pronajem", 2]
];

export const DEFAULT_CATEGORIES: readonly CategoryDefinition[] = MAIN_CATEGORIES.flatMap(([mainName, mainCb]) =>
  DEAL_TYPES.map(([typeName, typeCb]) => ({ name: `${mainName}-${typeName}`, mainCb, typeCb }))
);

/** Narrows the partitions to the named subset, keeping the default order. Unknown names are returned separately. */
export function selectCategories(
  names: readonly string[],
  available: readonly CategoryDefinition[] = DEFAULT_CATEGORIES
): { selected: CategoryDefinition[]; unknown: string[] } {
  if (names.length === 0) {
    return { selected: [...available], unknown: [] };
  }
  const wanted = new Set(names.map((name) => name.trim().toLowerCase()));
  const selected = available.filter((category) => wanted.has(category.name));
  const known = new Set(selected.map((category) => category.name));
  return { selected, unknown: [...wanted].filter((name) => !known.has(name)) };
}
