import type { ControlEmoji, PaginatorConfig } from '../config/paginator.js';
import { pageSummary, type PageEntry } from './page.js';

export const CONTROL_ROLES = ['select', 'first', 'back', 'callback', 'next', 'last'] as const;
export type ControlRole = (typeof CONTROL_ROLES)[number];

export const MAX_SELECT_OPTIONS = 25;
export const MAX_ROW_BUTTONS = 5;
const MAX_LABEL = 100;
const MAX_PLACEHOLDER = 150;

export type ButtonControl = {
  kind: 'button';
  role: Exclude<ControlRole, 'select'>;
  customId: string;
  emoji: ControlEmoji;
  style: PaginatorConfig['buttonStyle'];
  disabled: boolean;
};

export type SelectOption = { label: string; value: string };

export type SelectControl = {
  kind: 'select';
  role: 'select';
  customId: string;
  placeholder: string;
  options: SelectOption[];
  disabled: boolean;
};

export type ControlSpec = ButtonControl | SelectControl;

export type LayoutInput = {
  sessionId: string;
  pages: readonly PageEntry[];
  pageIndex: number;
  config: PaginatorConfig;
  /** Forces every control off, used when the paginator stops or times out. */
  disabled?: boolean;
};

export function customIdFor(sessionId: string, role: ControlRole): string {
  return `${sessionId}|${role}`;
}

/** Splits `"{sessionId}|{role}"`; null when the id is not one of ours. */
export function parseCustomId(customId: string): { sessionId: string; role: ControlRole } | null {
  const at = customId.lastIndexOf('|');
  if (at <= 0) return null;
  const role = customId.slice(at + 1);
  const match = CONTROL_ROLES.find((r) => r === role);
  return match ? { sessionId: customId.slice(0, at), role: match } : null;
}

const clip = (s: string, max: number) => {
  const chars = Array.from(s);
  return chars.length <= max ? s : `${chars.slice(0, max - 1).join('')}…`;
};

/** Indices shown in the select menu: all pages, or a window around the current one. */
export function selectWindow(pageIndex: number, pageCount: number): number[] {
  const size = Math.min(pageCount, MAX_SELECT_OPTIONS);
  const start = Math.min(Math.max(pageIndex - Math.floor(MAX_SELECT_OPTIONS / 2), 0), pageCount - size);
  return Array.from({ length: size }, (_, k) => start + k);
}

function selectControl(input: LayoutInput, disabled: boolean): SelectControl {
  const { pages, pageIndex, sessionId } = input;
  const label = (i: number) => `${i + 1} ${pageSummary(pages[i], i)}`;
  return {
    kind: 'select',
    role: 'select',
    customId: customIdFor(sessionId, 'select'),
    placeholder: clip(label(pageIndex), MAX_PLACEHOLDER),
    options: selectWindow(pageIndex, pages.length).map((i) => ({
      label: clip(label(i), MAX_LABEL),
      value: String(i),
    })),
    disabled,
  };
}

/**
 * Controls for the current position, in display order:
 * select, first, back, callback, next, last.
 */
export function buildControls(input: LayoutInput): ControlSpec[] {
  const { config, pageIndex, sessionId } = input;
  const pageCount = input.pages.length;
  const off = input.disabled ?? false;
  const atStart = pageIndex === 0;
  const atEnd = pageIndex >= pageCount - 1;

  const button = (role: ButtonControl['role'], emoji: ControlEmoji, disabled: boolean): ButtonControl => ({
    kind: 'button',
    role,
    customId: customIdFor(sessionId, role),
    emoji,
    style: config.buttonStyle,
    disabled: off || disabled,
  });

  const out: ControlSpec[] = [];
  if (config.showSelectMenu && pageCount > 0) out.push(selectControl(input, off));
  if (config.showFirst) out.push(button('first', config.firstEmoji, atStart));
  if (config.showBack) out.push(button('back', config.backEmoji, atStart));
  if (config.showCallback) out.push(button('callback', config.callbackEmoji, false));
  if (config.showNext) out.push(button('next', config.nextEmoji, atEnd));
  if (config.showLast) out.push(button('last', config.lastEmoji, atEnd));
  return out;
}

/** A select menu takes a row to itself; buttons share rows of up to five. */
export function spreadToRows(controls: readonly ControlSpec[]): ControlSpec[][] {
  const rows: ControlSpec[][] = [];
  let buttons: ControlSpec[] = [];
  for (const c of controls) {
    if (c.kind === 'select') {
      if (buttons.length) rows.push(buttons);
      buttons = [];
      rows.push([c]);
      continue;
    }
    if (buttons.length === MAX_ROW_BUTTONS) {
      rows.push(buttons);
      buttons = [];
    }
    buttons.push(c);
  }
  if (buttons.length) rows.push(buttons);
  return rows;
}
