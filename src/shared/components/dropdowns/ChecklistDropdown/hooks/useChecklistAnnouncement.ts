/**
 * src/shared/components/dropdowns/ChecklistDropdown/hooks/useChecklistAnnouncement.ts
 *
 * Text for the checklist's aria-live region, derived from props.
 */

import { useMemo } from 'react';
import { countChecked } from '../../../../../utils/checklistItems';

interface UseChecklistAnnouncementProps<Item> {
  isOpen: boolean;
  items: readonly Item[];
  itemChecked: (item: Item) => boolean;
}

export function useChecklistAnnouncement<Item>({
  isOpen,
  items,
  itemChecked,
}: UseChecklistAnnouncementProps<Item>): string {
  return useMemo(() => {
    if (!isOpen) {
      return 'Checklist collapsed';
    }
    return `${countChecked(items, itemChecked)} of ${items.length} selected`;
  }, [isOpen, items, itemChecked]);
}
