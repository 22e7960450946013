import type { ChecklistConfig } from '../../../../core/checklist/config';
import type { DropdownState } from '../../../../core/checklist/state';

export interface ChecklistDropdownProps<Item> {
  // Core props
  config: ChecklistConfig<Item>;
  state: DropdownState;
  items: readonly Item[];

  // Markup props
  id?: string;
  className?: string;
}
