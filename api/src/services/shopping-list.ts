import type { CartIngredientRow } from '../stores/types';

export interface ShoppingListEntry {
  id: string;
  name: string;
  measurement_unit: string;
  total_amount: number;
}

export const SHOPPING_LIST_FILENAME = 'shopping_list.txt';

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sums amounts per ingredient over every cart row. The order of the rows does
 * not affect the result; output is sorted by name, then unit, then id.
 */
export function aggregateShoppingList(rows: CartIngredientRow[]): ShoppingListEntry[] {
  const totals = new Map<string, ShoppingListEntry>();

  for (const row of rows) {
    const entry = totals.get(row.ingredient_id);
    if (entry) {
      entry.total_amount += row.amount;
    } else {
      totals.set(row.ingredient_id, {
        id: row.ingredient_id,
        name: row.name,
        measurement_unit: row.measurement_unit,
        total_amount: row.amount,
      });
    }
  }

  return [...totals.values()].sort(
    (a, b) =>
      compare(a.name, b.name) || compare(a.measurement_unit, b.measurement_unit) || compare(a.id, b.id)
  );
}

export function renderShoppingList(entries: ShoppingListEntry[]): string {
  return entries.map((e) => `${e.name} (${e.measurement_unit}) — ${e.total_amount}`).join('\n');
}
