/**
 * src/core/checklist/state.ts
 *
 * Open/closed state for a checklist dropdown.
 * The host keeps this value; the widget only proposes the next one.
 */

export interface DropdownState {
  readonly isOpen: boolean;
}

/**
 * Initial state for a new dropdown: closed.
 */
export function init(): DropdownState {
  return { isOpen: false };
}

/**
 * Next state after the toggle button is activated. Fires the same way from
 * either state; there are no guards.
 */
export function toggleState(state: DropdownState): DropdownState {
  return { isOpen: !state.isOpen };
}
