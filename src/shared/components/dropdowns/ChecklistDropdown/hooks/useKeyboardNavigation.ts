/**
 * src/shared/components/dropdowns/ChecklistDropdown/hooks/useKeyboardNavigation.ts
 *
 * Moves focus between the controls of an open checklist panel in on-screen
 * order. Never opens, closes or checks anything.
 */

import { useCallback, type KeyboardEvent, type RefObject } from 'react';
import type { OpenDirection } from '../../../../../core/checklist/config';

export type NavigationKey = 'ArrowDown' | 'ArrowUp' | 'Home' | 'End';

const NAVIGATION_KEYS: ReadonlySet<string> = new Set(['ArrowDown', 'ArrowUp', 'Home', 'End']);

const FOCUSABLE_SELECTOR = 'button:not([disabled]), input[type="checkbox"]:not([disabled])';

const GROUP_SECTION = '.checklist-group-operations';
const ITEMS_SECTION = '.checklist-items';

/**
 * Panel sections from top to bottom. The up panel is laid out with
 * column-reverse, so its checklist sits above the group buttons.
 */
export function getSectionOrder(openDirection: OpenDirection): readonly string[] {
  return openDirection === 'up' ? [ITEMS_SECTION, GROUP_SECTION] : [GROUP_SECTION, ITEMS_SECTION];
}

/**
 * Focusable controls of the panel in the order they appear on screen.
 */
export function getVisualControls(
  panel: HTMLElement,
  openDirection: OpenDirection
): HTMLElement[] {
  return getSectionOrder(openDirection).flatMap((selector) => {
    const section = panel.querySelector(selector);
    return section ? Array.from(section.querySelectorAll<HTMLElement>(FOCUSABLE_SELECTOR)) : [];
  });
}

export function isNavigationKey(key: string): key is NavigationKey {
  return NAVIGATION_KEYS.has(key);
}

/**
 * Index to focus after `key`, wrapping at both ends. `currentIndex` is -1
 * when focus is outside the panel. Returns -1 when there is nothing to focus.
 */
export function getNextFocusIndex(currentIndex: number, count: number, key: NavigationKey): number {
  if (count === 0) return -1;

  switch (key) {
    case 'Home':
      return 0;
    case 'End':
      return count - 1;
    case 'ArrowDown':
      return currentIndex < 0 || currentIndex >= count - 1 ? 0 : currentIndex + 1;
    case 'ArrowUp':
      return currentIndex <= 0 ? count - 1 : currentIndex - 1;
  }
}

interface UseKeyboardNavigationProps {
  panelRef: RefObject<HTMLElement>;
  openDirection: OpenDirection;
}

export function useKeyboardNavigation({ panelRef, openDirection }: UseKeyboardNavigationProps) {
  const handleKeyDown = useCallback(
    (event: KeyboardEvent<HTMLElement>) => {
      const panel = panelRef.current;
      if (!panel || !isNavigationKey(event.key)) {
        return;
      }

      const controls = getVisualControls(panel, openDirection);
      const active = document.activeElement;
      const currentIndex = controls.findIndex((control) => control === active);
      const nextIndex = getNextFocusIndex(currentIndex, controls.length, event.key);
      if (nextIndex < 0) {
        return;
      }

      event.preventDefault();
      event.stopPropagation();
      controls[nextIndex].focus();
    },
    [openDirection, panelRef]
  );

  return { handleKeyDown };
}
