/**
 * src/shared/components/dropdowns/ChecklistDropdown/ChecklistDropdown.tsx
 *
 * Multi-select dropdown rendered as a toggle button and, when open, a panel
 * with optional "Check All"/"Uncheck All" buttons and a checklist.
 *
 * The component holds no state of its own. Every interaction is reported
 * through the config callbacks and the host re-renders with new props.
 */

import { useRef, type CSSProperties, type ReactElement } from 'react';
import type {
  ChecklistConfig,
  ColorPalette,
  GroupOperations,
} from '../../../../core/checklist/config';
import { toggleState, type DropdownState } from '../../../../core/checklist/state';
import { errorHandler } from '../../../../utils/errorHandler';
import type { ChecklistDropdownProps } from './types';
import { useKeyboardNavigation } from './hooks/useKeyboardNavigation';
import { useChecklistAnnouncement } from './hooks/useChecklistAnnouncement';
import './ChecklistDropdown.css';

const scopedErrorHandler = errorHandler.createScoped('ChecklistDropdown');

/**
 * Runs a host intent callback from an event handler. React does not route
 * event handler errors to error boundaries, so failures are reported here.
 */
const emitIntent = (callback: string, intent: () => void) => {
  try {
    intent();
  } catch (err) {
    scopedErrorHandler.handle(err, { phase: 'callback', callback });
  }
};

const buttonStyle = (colors: ColorPalette): CSSProperties => ({
  backgroundColor: colors.buttonColor,
  borderColor: colors.buttonBorder,
  color: colors.textColor,
});

const panelStyle = (colors: ColorPalette): CSSProperties => ({
  backgroundColor: colors.background,
  borderColor: colors.backgroundBorder,
  color: colors.textColor,
});

interface GroupOperationsPanelProps {
  groupOperations: GroupOperations;
  colors: ColorPalette;
}

function GroupOperationsPanel({ groupOperations, colors }: GroupOperationsPanelProps) {
  if (groupOperations.kind === 'none') {
    return null;
  }

  const { onSetAll } = groupOperations;
  return (
    <div className="checklist-group-operations" role="group" aria-label="Group operations">
      <button
        type="button"
        className="checklist-group-button"
        style={buttonStyle(colors)}
        onClick={() => emitIntent('onSetAll', () => onSetAll(true))}
      >
        Check All
      </button>
      <button
        type="button"
        className="checklist-group-button"
        style={buttonStyle(colors)}
        onClick={() => emitIntent('onSetAll', () => onSetAll(false))}
      >
        Uncheck All
      </button>
    </div>
  );
}

interface ChecklistPanelProps<Item> {
  items: readonly Item[];
  itemLabel: (item: Item) => string;
  itemChecked: (item: Item) => boolean;
  onToggleItem: (item: Item) => void;
}

function ChecklistPanel<Item>({
  items,
  itemLabel,
  itemChecked,
  onToggleItem,
}: ChecklistPanelProps<Item>) {
  if (items.length === 0) {
    return (
      <div className="checklist-items">
        <div className="checklist-empty">No items</div>
      </div>
    );
  }

  return (
    <div className="checklist-items" role="group">
      {items.map((item, index) => (
        // Labels may repeat, so rows are keyed by position
        <label key={index} className="checklist-row">
          <input
            type="checkbox"
            className="checklist-checkbox"
            checked={itemChecked(item)}
            onChange={() => emitIntent('onToggleItem', () => onToggleItem(item))}
          />
          <span className="checklist-row-label">{itemLabel(item)}</span>
        </label>
      ))}
    </div>
  );
}

function ChecklistDropdown<Item>({
  config,
  state,
  items,
  id,
  className = '',
}: ChecklistDropdownProps<Item>) {
  const {
    label,
    openDirection,
    colors,
    groupOperations,
    itemLabel,
    itemChecked,
    onToggleItem,
    onStateChange,
  } = config;

  const panelRef = useRef<HTMLDivElement>(null);
  const { handleKeyDown } = useKeyboardNavigation({ panelRef, openDirection });
  const announcement = useChecklistAnnouncement({ isOpen: state.isOpen, items, itemChecked });

  const panelId = `${id || 'checklist-dropdown'}-panel`;
  const position = openDirection === 'up' ? 'top' : 'bottom';

  const containerClasses = ['checklist-dropdown', state.isOpen && 'open', className]
    .filter(Boolean)
    .join(' ');

  return (
    <div className={containerClasses}>
      <button
        type="button"
        id={id}
        className="checklist-dropdown-toggle"
        style={buttonStyle(colors)}
        onClick={() => emitIntent('onStateChange', () => onStateChange(toggleState(state)))}
        aria-expanded={state.isOpen}
        aria-controls={panelId}
      >
        <span className="checklist-dropdown-label">{label}</span>
        <span className="checklist-dropdown-arrow" aria-hidden="true">
          <svg
            width="12"
            height="12"
            viewBox="0 0 24 24"
            fill="none"
            stroke="currentColor"
            strokeWidth="2"
            strokeLinecap="round"
            strokeLinejoin="round"
          >
            <polyline points={openDirection === 'up' ? '6,15 12,9 18,15' : '6,9 12,15 18,9'} />
          </svg>
        </span>
      </button>

      {state.isOpen && (
        <div
          ref={panelRef}
          id={panelId}
          className={`checklist-dropdown-panel position-${position}`}
          style={panelStyle(colors)}
          onKeyDown={handleKeyDown}
        >
          <GroupOperationsPanel groupOperations={groupOperations} colors={colors} />
          <ChecklistPanel
            items={items}
            itemLabel={itemLabel}
            itemChecked={itemChecked}
            onToggleItem={onToggleItem}
          />
        </div>
      )}

      <div aria-live="polite" aria-atomic="true" className="sr-only">
        {announcement}
      </div>
    </div>
  );
}

/**
 * Visual tree for one dropdown instance.
 */
export function render<Item>(
  config: ChecklistConfig<Item>,
  state: DropdownState,
  items: readonly Item[]
): ReactElement {
  return <ChecklistDropdown config={config} state={state} items={items} />;
}

export default ChecklistDropdown;
