/**
 * src/shared/components/dropdowns/ChecklistDropdown/ChecklistDropdown.test.tsx
 *
 * Test suite for ChecklistDropdown.
 * Covers open/closed rendering, intents, group operations, direction,
 * colors and keyboard focus movement.
 */

import React from 'react';
import ReactDOM from 'react-dom/client';
import { act } from 'react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import ChecklistDropdown, { render } from './ChecklistDropdown';
import {
  makeConfig,
  makeCustomConfig,
  noGroupOperations,
  selectAllOperations,
  withColors,
  type CheckItem,
  type ChecklistConfig,
  type GroupOperations,
  type OpenDirection,
} from '@core/checklist/config';
import { init, toggleState } from '@core/checklist/state';
import { ErrorCategory, errorHandler } from '@utils/errorHandler';

const ITEMS: CheckItem[] = [
  { label: 'Cherry', checked: false },
  { label: 'Apple', checked: true },
  { label: 'Banana', checked: false },
];

const OPEN = toggleState(init());
const CLOSED = init();

interface ConfigOverrides {
  openDirection?: OpenDirection;
  groupOperations?: GroupOperations;
}

const buildConfig = (overrides: ConfigOverrides = {}) => {
  const onStateChange = vi.fn();
  const onToggleItem = vi.fn();
  const config: ChecklistConfig<CheckItem> = makeCustomConfig<CheckItem>({
    ...makeConfig({ label: 'Fruits', onStateChange, onToggleItem }),
    openDirection: overrides.openDirection ?? 'down',
    groupOperations: overrides.groupOperations ?? noGroupOperations,
  });
  return { config, onStateChange, onToggleItem };
};

describe('ChecklistDropdown', () => {
  let container: HTMLDivElement;
  let root: ReactDOM.Root;

  beforeEach(() => {
    container = document.createElement('div');
    document.body.appendChild(container);
    root = ReactDOM.createRoot(container);
  });

  afterEach(() => {
    act(() => {
      root.unmount();
    });
    container.remove();
  });

  const mount = async (element: React.ReactElement) => {
    await act(async () => {
      root.render(element);
      await Promise.resolve();
    });
  };

  const click = (element: Element | null) => {
    if (!element) throw new Error('Element not found');
    act(() => {
      element.dispatchEvent(new MouseEvent('click', { bubbles: true }));
    });
  };

  const pressKey = async (element: Element | null, key: string) => {
    if (!element) throw new Error('Element not found');
    await act(async () => {
      element.dispatchEvent(new KeyboardEvent('keydown', { key, bubbles: true }));
      await Promise.resolve();
    });
  };

  const rowLabels = () =>
    Array.from(container.querySelectorAll('.checklist-row-label')).map((node) => node.textContent);

  const groupButtonLabels = () =>
    Array.from(container.querySelectorAll('.checklist-group-button')).map(
      (node) => node.textContent
    );

  it('renders only the toggle button while closed', async () => {
    const { config } = buildConfig({ groupOperations: selectAllOperations(vi.fn()) });
    await mount(<ChecklistDropdown config={config} state={CLOSED} items={ITEMS} />);

    const toggle = container.querySelector('.checklist-dropdown-toggle');
    expect(toggle?.textContent).toBe('Fruits');
    expect(toggle?.getAttribute('aria-expanded')).toBe('false');
    expect(container.querySelector('.checklist-dropdown-panel')).toBeNull();
    expect(container.querySelectorAll('input[type="checkbox"]')).toHaveLength(0);
    expect(groupButtonLabels()).toEqual([]);
    expect(container.querySelector('[aria-live]')?.textContent).toBe('Checklist collapsed');
  });

  it('emits the toggled state without changing its own rendering', async () => {
    const { config, onStateChange } = buildConfig();
    await mount(<ChecklistDropdown config={config} state={CLOSED} items={ITEMS} />);

    click(container.querySelector('.checklist-dropdown-toggle'));
    expect(onStateChange).toHaveBeenCalledWith({ isOpen: true });
    expect(container.querySelector('.checklist-dropdown-panel')).toBeNull();

    await mount(<ChecklistDropdown config={config} state={OPEN} items={ITEMS} />);
    click(container.querySelector('.checklist-dropdown-toggle'));
    expect(onStateChange).toHaveBeenLastCalledWith({ isOpen: false });
    expect(onStateChange).toHaveBeenCalledTimes(2);
  });

  it('lists items in input order with their checked flags', async () => {
    const { config } = buildConfig();
    await mount(<ChecklistDropdown config={config} state={OPEN} items={ITEMS} />);

    expect(rowLabels()).toEqual(['Cherry', 'Apple', 'Banana']);
    const checkboxes = container.querySelectorAll<HTMLInputElement>('.checklist-checkbox');
    expect(Array.from(checkboxes).map((box) => box.checked)).toEqual([false, true, false]);
    expect(container.querySelector('[aria-live]')?.textContent).toBe('1 of 3 selected');
    expect(
      container.querySelector('.checklist-dropdown-toggle')?.getAttribute('aria-expanded')
    ).toBe('true');
  });

  it('reports the activated item and leaves the new value to the host', async () => {
    const { config, onToggleItem } = buildConfig();
    await mount(<ChecklistDropdown config={config} state={OPEN} items={ITEMS} />);

    const checkboxes = container.querySelectorAll('.checklist-checkbox');
    click(checkboxes.item(2));

    expect(onToggleItem).toHaveBeenCalledTimes(1);
    expect(onToggleItem.mock.calls[0][0]).toBe(ITEMS[2]);
  });

  it('omits group buttons when no group operations are configured', async () => {
    const { config } = buildConfig();
    await mount(<ChecklistDropdown config={config} state={OPEN} items={ITEMS} />);

    expect(container.querySelector('.checklist-group-operations')).toBeNull();
    expect(container.textContent).not.toContain('Check All');
  });

  it('renders Check All then Uncheck All and emits the matching flag', async () => {
    const onSetAll = vi.fn();
    const { config } = buildConfig({ groupOperations: selectAllOperations(onSetAll) });
    await mount(<ChecklistDropdown config={config} state={OPEN} items={ITEMS} />);

    expect(groupButtonLabels()).toEqual(['Check All', 'Uncheck All']);

    const [checkAll, uncheckAll] = Array.from(
      container.querySelectorAll('.checklist-group-button')
    );
    click(checkAll);
    click(uncheckAll);

    expect(onSetAll.mock.calls).toEqual([[true], [false]]);
  });

  it('places the panel below or above the button by direction', async () => {
    const groupOperations = selectAllOperations(vi.fn());

    await mount(
      <ChecklistDropdown
        config={buildConfig({ groupOperations }).config}
        state={OPEN}
        items={ITEMS}
      />
    );
    let panel = container.querySelector('.checklist-dropdown-panel');
    expect(panel?.className).toBe('checklist-dropdown-panel position-bottom');
    expect(panel?.firstElementChild?.className).toBe('checklist-group-operations');

    await mount(
      <ChecklistDropdown
        config={buildConfig({ groupOperations, openDirection: 'up' }).config}
        state={OPEN}
        items={ITEMS}
      />
    );
    panel = container.querySelector('.checklist-dropdown-panel');
    expect(panel?.className).toBe('checklist-dropdown-panel position-top');
    expect(panel?.firstElementChild?.className).toBe('checklist-group-operations');
    expect(rowLabels()).toEqual(['Cherry', 'Apple', 'Banana']);
  });

  it('styles the button and panel from the palette', async () => {
    const { config } = buildConfig();
    const colors = withColors({
      background: 'rgb(1, 2, 3)',
      backgroundBorder: 'rgb(4, 5, 6)',
      buttonColor: 'rgb(7, 8, 9)',
      buttonBorder: 'rgb(10, 11, 12)',
      textColor: 'rgb(13, 14, 15)',
    });
    await mount(
      <ChecklistDropdown config={{ ...config, colors }} state={OPEN} items={ITEMS} />
    );

    const toggle = container.querySelector<HTMLElement>('.checklist-dropdown-toggle');
    expect(toggle?.style.backgroundColor).toBe('rgb(7, 8, 9)');
    expect(toggle?.style.borderColor).toBe('rgb(10, 11, 12)');
    expect(toggle?.style.color).toBe('rgb(13, 14, 15)');

    const panel = container.querySelector<HTMLElement>('.checklist-dropdown-panel');
    expect(panel?.style.backgroundColor).toBe('rgb(1, 2, 3)');
    expect(panel?.style.borderColor).toBe('rgb(4, 5, 6)');
  });

  it('shows a placeholder row for an empty list', async () => {
    const { config } = buildConfig();
    await mount(<ChecklistDropdown config={config} state={OPEN} items={[]} />);

    expect(container.querySelector('.checklist-empty')?.textContent).toBe('No items');
    expect(container.querySelector('[aria-live]')?.textContent).toBe('0 of 0 selected');
  });

  it('works with host item types through the accessors', async () => {
    interface Task {
      id: string;
      title: string;
      done: boolean;
    }
    const tasks: Task[] = [
      { id: 't1', title: 'Write docs', done: true },
      { id: 't2', title: 'Ship release', done: false },
    ];
    const onToggleItem = vi.fn();
    const config = makeCustomConfig<Task>({
      label: 'Tasks',
      openDirection: 'down',
      colors: withColors(),
      groupOperations: noGroupOperations,
      itemLabel: (task) => task.title.toUpperCase(),
      itemChecked: (task) => task.done,
      onToggleItem,
      onStateChange: vi.fn(),
    });

    await mount(<ChecklistDropdown config={config} state={OPEN} items={tasks} id="tasks" />);

    expect(rowLabels()).toEqual(['WRITE DOCS', 'SHIP RELEASE']);
    expect(
      container.querySelector('.checklist-dropdown-toggle')?.getAttribute('aria-controls')
    ).toBe('tasks-panel');
    expect(container.querySelector('#tasks-panel')).not.toBeNull();

    click(container.querySelectorAll('.checklist-checkbox').item(0));
    expect(onToggleItem).toHaveBeenCalledWith(tasks[0]);
  });

  it('moves focus through the panel controls with wrap-around', async () => {
    const onSetAll = vi.fn();
    const { config, onStateChange, onToggleItem } = buildConfig({
      groupOperations: selectAllOperations(onSetAll),
    });
    await mount(<ChecklistDropdown config={config} state={OPEN} items={ITEMS} />);

    const panel = container.querySelector('.checklist-dropdown-panel');
    const controls = Array.from(
      panel?.querySelectorAll<HTMLElement>('button, input[type="checkbox"]') ?? []
    );
    expect(controls).toHaveLength(5);

    act(() => {
      controls[0].focus();
    });
    await pressKey(document.activeElement, 'ArrowDown');
    expect(document.activeElement).toBe(controls[1]);

    await pressKey(document.activeElement, 'End');
    expect(document.activeElement).toBe(controls[4]);

    await pressKey(document.activeElement, 'ArrowDown');
    expect(document.activeElement).toBe(controls[0]);

    await pressKey(document.activeElement, 'ArrowUp');
    expect(document.activeElement).toBe(controls[4]);

    await pressKey(document.activeElement, 'Home');
    expect(document.activeElement).toBe(controls[0]);

    await pressKey(document.activeElement, 'Escape');
    expect(onStateChange).not.toHaveBeenCalled();
    expect(onToggleItem).not.toHaveBeenCalled();
    expect(onSetAll).not.toHaveBeenCalled();
  });

  it('follows on-screen order when the panel opens upwards', async () => {
    const { config } = buildConfig({
      openDirection: 'up',
      groupOperations: selectAllOperations(vi.fn()),
    });
    await mount(<ChecklistDropdown config={config} state={OPEN} items={ITEMS} />);

    const checkboxes = Array.from(container.querySelectorAll<HTMLElement>('.checklist-checkbox'));
    const [checkAll, uncheckAll] = Array.from(
      container.querySelectorAll<HTMLElement>('.checklist-group-button')
    );

    act(() => {
      checkboxes[2].focus();
    });
    await pressKey(document.activeElement, 'ArrowDown');
    expect(document.activeElement).toBe(checkAll);

    await pressKey(document.activeElement, 'ArrowDown');
    expect(document.activeElement).toBe(uncheckAll);

    await pressKey(document.activeElement, 'ArrowDown');
    expect(document.activeElement).toBe(checkboxes[0]);

    await pressKey(document.activeElement, 'End');
    expect(document.activeElement).toBe(uncheckAll);

    await pressKey(document.activeElement, 'Home');
    expect(document.activeElement).toBe(checkboxes[0]);
  });

  describe('host callback failures', () => {
    beforeEach(() => {
      vi.spyOn(console, 'groupCollapsed').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(console, 'groupEnd').mockImplementation(() => {});
      errorHandler.clearHistory();
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('reports a throwing onToggleItem through the error handler', async () => {
      const { config } = buildConfig();
      const failing = {
        ...config,
        onToggleItem: () => {
          throw new Error('host toggle failed');
        },
      };
      await mount(<ChecklistDropdown config={failing} state={OPEN} items={ITEMS} />);

      click(container.querySelectorAll('.checklist-checkbox').item(0));

      const history = errorHandler.getHistory();
      expect(history).toHaveLength(1);
      expect(history[0].category).toBe(ErrorCategory.CALLBACK);
      expect(history[0].message).toBe('host toggle failed');
      expect(history[0].context).toEqual({
        scope: 'ChecklistDropdown',
        phase: 'callback',
        callback: 'onToggleItem',
      });
      expect(rowLabels()).toEqual(['Cherry', 'Apple', 'Banana']);
    });

    it('reports throwing onStateChange and onSetAll callbacks', async () => {
      const { config } = buildConfig();
      const failing = {
        ...config,
        groupOperations: selectAllOperations(() => {
          throw new Error('set all failed');
        }),
        onStateChange: () => {
          throw new Error('state change failed');
        },
      };
      await mount(<ChecklistDropdown config={failing} state={OPEN} items={ITEMS} />);

      click(container.querySelector('.checklist-dropdown-toggle'));
      click(container.querySelectorAll('.checklist-group-button').item(1));

      expect(
        errorHandler.getHistory().map((report) => [report.context?.callback, report.message])
      ).toEqual([
        ['onStateChange', 'state change failed'],
        ['onSetAll', 'set all failed'],
      ]);
    });
  });

  it('builds the same tree through render()', async () => {
    const { config } = buildConfig();
    await mount(render(config, OPEN, ITEMS));

    expect(container.querySelector('.checklist-dropdown.open')).not.toBeNull();
    expect(rowLabels()).toEqual(['Cherry', 'Apple', 'Banana']);
  });
});
