/**
 * Public entry point: state, configuration, list helpers and the
 * ChecklistDropdown component.
 */

export { init, toggleState } from './core/checklist/state';
export type { DropdownState } from './core/checklist/state';

export {
  defaultColors,
  makeConfig,
  makeCustomConfig,
  noGroupOperations,
  selectAllOperations,
  withColors,
} from './core/checklist/config';
export type {
  CheckItem,
  ChecklistConfig,
  ColorPalette,
  CustomConfigOptions,
  GroupOperations,
  OpenDirection,
  SimpleConfigOptions,
} from './core/checklist/config';

export { countChecked, selectAll, toggleItem } from './utils/checklistItems';

export { ChecklistDropdown, render } from './shared/components/dropdowns/ChecklistDropdown';
export type { ChecklistDropdownProps } from './shared/components/dropdowns/ChecklistDropdown';

export { default as ChecklistErrorBoundary } from './shared/components/errors/ChecklistErrorBoundary';

export { useChecklistDropdown } from './shared/hooks/useChecklistDropdown';
export type {
  UseChecklistDropdownOptions,
  UseChecklistDropdownResult,
} from './shared/hooks/useChecklistDropdown';

export {
  ErrorCategory,
  ErrorSeverity,
  errorHandler,
  subscribeToErrors,
} from './utils/errorHandler';
export type { ErrorDetails, ErrorHandlerOptions } from './utils/errorHandler';
