/**
 * Normalize an ingredient name for identity comparison.
 * Only trims and lowercases: "Tomato" and "tomatoes" stay distinct.
 */
export function normalizeIngredientName(name: string): string {
  return name.trim().toLowerCase()
}
