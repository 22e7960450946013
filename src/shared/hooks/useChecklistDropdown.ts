/**
 * src/shared/hooks/useChecklistDropdown.ts
 *
 * Host-side convenience for the common case: keeps the dropdown state and a
 * list of CheckItems in React state and builds a config whose callbacks apply
 * the toggle, toggleItem and selectAll transitions.
 */

import { useCallback, useMemo, useState } from 'react';
import {
  checkItemChecked,
  checkItemLabel,
  makeCustomConfig,
  noGroupOperations,
  selectAllOperations,
  withColors,
  type CheckItem,
  type ChecklistConfig,
  type ColorPalette,
  type OpenDirection,
} from '../../core/checklist/config';
import { init, type DropdownState } from '../../core/checklist/state';
import { selectAll, toggleItem } from '../../utils/checklistItems';

export interface UseChecklistDropdownOptions {
  label?: string;
  openDirection?: OpenDirection;
  colors?: Partial<ColorPalette>;
  /** Adds the "Check All"/"Uncheck All" buttons. */
  groupOperations?: boolean;
}

export interface UseChecklistDropdownResult {
  state: DropdownState;
  items: CheckItem[];
  setItems: (items: CheckItem[]) => void;
  config: ChecklistConfig<CheckItem>;
}

export function useChecklistDropdown(
  initialItems: readonly CheckItem[],
  options: UseChecklistDropdownOptions = {}
): UseChecklistDropdownResult {
  const { label = 'Select...', openDirection = 'down', colors, groupOperations = false } = options;

  const [state, setState] = useState<DropdownState>(init);
  const [items, setItems] = useState<CheckItem[]>(() => [...initialItems]);

  const handleToggleItem = useCallback((item: CheckItem) => {
    setItems((current) => toggleItem(item, current));
  }, []);

  const handleSetAll = useCallback((check: boolean) => {
    setItems((current) => selectAll(check, current));
  }, []);

  const { background, backgroundBorder, buttonColor, buttonBorder, textColor } = colors ?? {};
  const palette = useMemo(
    () => withColors({ background, backgroundBorder, buttonColor, buttonBorder, textColor }),
    [background, backgroundBorder, buttonColor, buttonBorder, textColor]
  );

  const config = useMemo(
    () =>
      makeCustomConfig<CheckItem>({
        label,
        openDirection,
        colors: palette,
        groupOperations: groupOperations ? selectAllOperations(handleSetAll) : noGroupOperations,
        itemLabel: checkItemLabel,
        itemChecked: checkItemChecked,
        onToggleItem: handleToggleItem,
        onStateChange: setState,
      }),
    [label, openDirection, palette, groupOperations, handleSetAll, handleToggleItem]
  );

  return { state, items, setItems, config };
}
