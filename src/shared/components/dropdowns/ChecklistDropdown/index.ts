/**
 * src/shared/components/dropdowns/ChecklistDropdown/index.ts
 *
 * Barrel exports for ChecklistDropdown.
 */

export { default as ChecklistDropdown, render } from './ChecklistDropdown';
export type { ChecklistDropdownProps } from './types';
