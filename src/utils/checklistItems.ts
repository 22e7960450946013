/**
 * src/utils/checklistItems.ts
 *
 * List helpers hosts use to apply checklist intents to their own items.
 * Both return fresh arrays of fresh items; the input is left untouched.
 */

import type { CheckItem } from '../core/checklist/config';

/**
 * Flips `checked` on every item whose label equals the target's.
 *
 * Matching is by label, not position: when several items share a label they
 * all flip together. Hosts with duplicate labels should use their own items
 * and a custom toggle keyed on identity.
 */
export function toggleItem(target: CheckItem, items: readonly CheckItem[]): CheckItem[] {
  return items.map((item) =>
    item.label === target.label
      ? { ...item, checked: !item.checked }
      : { ...item }
  );
}

/**
 * Overwrites `checked` on every item. Not a toggle: repeated calls with the
 * same flag leave the list unchanged.
 */
export function selectAll(check: boolean, items: readonly CheckItem[]): CheckItem[] {
  return items.map((item) => ({ ...item, checked: check }));
}

export function countChecked<Item>(
  items: readonly Item[],
  itemChecked: (item: Item) => boolean
): number {
  return items.reduce((total, item) => (itemChecked(item) ? total + 1 : total), 0);
}
