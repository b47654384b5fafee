/**
 * Status bar hints and the per-action info popup.
 * Reads the registry and the catalog, never mutates them.
 */

import { DEFAULT_USER_CONFIG, type UserConfig } from '../user-config';
import {
  VKEY_OTHER_COMMANDS,
  getDescription,
  getLabel,
  getStatusLabel,
  isVirtualKey,
} from './catalog';
import { waitForAnyKey } from './input-reader';
import type { KeyRegistry } from './registry';
import type { InputSource, Translate, VirtualKey } from './types';

export type TextStyle = 'normal' | 'highlight';

/** Drawing target for the two-row status bar. */
export interface StatusSurface {
  readonly width: number;
  erase(): void;
  print(x: number, y: number, text: string, style: TextStyle): void;
  refresh(): void;
}

export interface PopupSpec {
  rows: number;
  cols: number;
  y: number;
  x: number;
  title: string;
  message: string;
}

export interface PopupWindow {
  close(): void;
}

export interface PopupHost {
  readonly rows: number;
  readonly cols: number;
  openPopup(spec: PopupSpec): PopupWindow;
}

/** Entries of the configuration menu, which has no virtual keys of its own. */
export type ConfigMenuEntry = 'general' | 'layout' | 'sidebar' | 'color' | 'notify' | 'keys';

export type HintItem = VirtualKey | ConfigMenuEntry;

const CONFIG_MENU_HINTS: Record<ConfigMenuEntry, { key: string; label: string }> = {
  general: { key: 'g', label: 'General' },
  layout: { key: 'l', label: 'Layout' },
  sidebar: { key: 's', label: 'Sidebar' },
  color: { key: 'c', label: 'Color' },
  notify: { key: 'n', label: 'Notify' },
  keys: { key: 'k', label: 'Keys' },
};

/**
 * Sizes come from the explicit fields, then from `config` (usually the
 * result of `loadUserConfigSync`), then from `DEFAULT_USER_CONFIG`.
 */
export interface HintBarOptions {
  config?: UserConfig;
  keyWidth?: number;
  labelWidth?: number;
  translate?: Translate;
}

export interface InfoPopupOptions {
  config?: UserConfig;
  height?: number;
  margin?: number;
  translate?: Translate;
}

const identity: Translate = (message) => message;

export function displayWidth(text: string): number {
  return Array.from(text).length;
}

/** Cut `text` to at most `width` characters, without an ellipsis. */
export function chopToWidth(text: string, width: number): string {
  if (width <= 0) return '';
  return Array.from(text).slice(0, width).join('');
}

function describeHint(
  registry: KeyRegistry,
  item: HintItem,
  translate: Translate
): { key: string; label: string } {
  if (typeof item === 'string') {
    const hint = CONFIG_MENU_HINTS[item];
    return { key: hint.key, label: translate(hint.label) };
  }
  if (isVirtualKey(item)) {
    return { key: registry.first(item), label: translate(getStatusLabel(item)) };
  }
  return { key: '?', label: translate('Unknown') };
}

/**
 * Lay out one page of (key, label) hints in two rows. On a full page that is
 * not the last one the final slot points at the "other commands" action.
 */
export function renderHintBar(
  surface: StatusSurface,
  registry: KeyRegistry,
  items: readonly HintItem[],
  pageBase: number,
  pageSize: number,
  options: HintBarOptions = {}
): void {
  const { statusBar } = options.config ?? DEFAULT_USER_CONFIG;
  const keyWidth = options.keyWidth ?? statusBar.keyWidth;
  const labelWidth = options.labelWidth ?? statusBar.labelWidth;
  const translate = options.translate ?? identity;
  const slots = Math.min(pageSize, items.length - pageBase);

  surface.erase();
  if (slots <= 0) {
    surface.refresh();
    return;
  }

  const padding = Math.floor((surface.width * 2) / slots) - (keyWidth + labelWidth + 1);
  const cellWidth = keyWidth + labelWidth + 1 + padding;

  for (let i = 0; i < slots; i += 1) {
    const keyX = Math.floor(i / 2) * cellWidth;
    const y = i % 2;
    const isLastSlot = i === slots - 1;
    const isLastItem = pageBase + i === items.length - 1;
    const item = !isLastSlot || isLastItem ? items[pageBase + i] : VKEY_OTHER_COMMANDS;

    const hint = describeHint(registry, item, translate);
    const key = chopToWidth(hint.key, keyWidth);
    surface.print(keyX + keyWidth - displayWidth(key), y, key, 'highlight');
    surface.print(keyX + keyWidth + 1, y, hint.label, 'normal');
  }

  surface.refresh();
}

/**
 * Show the description of `action` in a centred popup until a key is read.
 */
export async function renderInfoPopup(
  action: VirtualKey,
  host: PopupHost,
  source: InputSource,
  options: InfoPopupOptions = {}
): Promise<void> {
  if (!isVirtualKey(action)) return;

  const translate = options.translate ?? identity;
  const { infoPopup } = options.config ?? DEFAULT_USER_CONFIG;
  const rows = options.height ?? infoPopup.height;
  const cols = host.cols - (options.margin ?? infoPopup.margin);

  const popup = host.openPopup({
    rows,
    cols,
    y: Math.floor((host.rows - rows) / 2),
    x: Math.floor((host.cols - cols) / 2),
    title: getLabel(action),
    message: translate(getDescription(action)),
  });

  try {
    await waitForAnyKey(source);
  } finally {
    popup.close();
  }
}
