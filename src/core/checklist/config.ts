/**
 * src/core/checklist/config.ts
 *
 * Per-render configuration for a checklist dropdown: label, colors, open
 * direction, group operations, item accessors and intent callbacks.
 */

import type { DropdownState } from './state';

export type OpenDirection = 'up' | 'down';

export interface ColorPalette {
  /** Fill of the open panel. */
  readonly background: string;
  readonly backgroundBorder: string;
  /** Fill of the toggle and group buttons. */
  readonly buttonColor: string;
  readonly buttonBorder: string;
  readonly textColor: string;
}

export type GroupOperations =
  | { readonly kind: 'none' }
  | { readonly kind: 'selectAll'; readonly onSetAll: (checked: boolean) => void };

export interface ChecklistConfig<Item> {
  readonly label: string;
  readonly openDirection: OpenDirection;
  readonly colors: ColorPalette;
  readonly groupOperations: GroupOperations;
  readonly itemLabel: (item: Item) => string;
  readonly itemChecked: (item: Item) => boolean;
  readonly onToggleItem: (item: Item) => void;
  readonly onStateChange: (state: DropdownState) => void;
}

/**
 * Item shape for the common case. Hosts with richer items use
 * makeCustomConfig and supply their own accessors.
 */
export interface CheckItem {
  readonly label: string;
  readonly checked: boolean;
}

export const checkItemLabel = (item: CheckItem): string => item.label;

export const checkItemChecked = (item: CheckItem): boolean => item.checked;

export const defaultColors: ColorPalette = Object.freeze({
  background: '#ffffff',
  backgroundBorder: '#d3d3d3',
  buttonColor: '#ffffff',
  buttonBorder: '#d3d3d3',
  textColor: '#000000',
});

export const noGroupOperations: GroupOperations = Object.freeze({ kind: 'none' as const });

export function selectAllOperations(onSetAll: (checked: boolean) => void): GroupOperations {
  return { kind: 'selectAll', onSetAll };
}

/**
 * Overlays a partial palette on the defaults. Missing or undefined entries
 * keep their default.
 */
export function withColors(overrides: Partial<ColorPalette> = {}): ColorPalette {
  return {
    background: overrides.background ?? defaultColors.background,
    backgroundBorder: overrides.backgroundBorder ?? defaultColors.backgroundBorder,
    buttonColor: overrides.buttonColor ?? defaultColors.buttonColor,
    buttonBorder: overrides.buttonBorder ?? defaultColors.buttonBorder,
    textColor: overrides.textColor ?? defaultColors.textColor,
  };
}

export interface SimpleConfigOptions {
  label: string;
  onStateChange: (state: DropdownState) => void;
  onToggleItem: (item: CheckItem) => void;
}

export type CustomConfigOptions<Item> = ChecklistConfig<Item>;

export function makeConfig({
  label,
  onStateChange,
  onToggleItem,
}: SimpleConfigOptions): ChecklistConfig<CheckItem> {
  return {
    label,
    onStateChange,
    onToggleItem,
    openDirection: 'down',
    colors: defaultColors,
    groupOperations: noGroupOperations,
    itemLabel: checkItemLabel,
    itemChecked: checkItemChecked,
  };
}

export function makeCustomConfig<Item>(options: CustomConfigOptions<Item>): ChecklistConfig<Item> {
  return {
    label: options.label,
    onStateChange: options.onStateChange,
    onToggleItem: options.onToggleItem,
    groupOperations: options.groupOperations,
    openDirection: options.openDirection,
    colors: options.colors,
    itemLabel: options.itemLabel,
    itemChecked: options.itemChecked,
  };
}
