/**
 * Shared terminal utilities
 *
 * Terminal contract, theme selection and alternate-buffer bookkeeping.
 * The theme is configured by the consuming application via setTheme().
 */

import type { IDisposable } from '@xterm/xterm';
import { type ThemeColors, type ThemeName, getAnsiColor, themes } from '../themes';

// ============================================================================
// Terminal contract
// ============================================================================

export interface KeyPress {
  key: string;
  domEvent: { key: string };
}

/**
 * The slice of a terminal the game needs. An `@xterm/xterm` Terminal
 * satisfies it, and so does the Node adapter in the CLI.
 */
export interface GameTerminal {
  write(data: string): void;
  readonly cols: number;
  readonly rows: number;
  onKey(listener: (event: KeyPress) => void): IDisposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

let currentTheme: ThemeName = 'neon';

/**
 * Set the current theme
 */
export function setTheme(mode: ThemeName): void {
  currentTheme = mode;
}

export function getTheme(): ThemeName {
  return currentTheme;
}

export function getThemeColors(): ThemeColors {
  return themes[currentTheme];
}

/**
 * Get current theme accent color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

interface VerticalAnchorOptions {
  headerRows?: number;
  footerRows?: number;
  minTop?: number;
}

/**
 * Compute a vertically-centered top row for content while reserving header/footer space.
 */
export function getVerticalAnchor(
  terminalRows: number,
  contentRows: number,
  options: VerticalAnchorOptions = {}
): number {
  const headerRows = options.headerRows ?? 0;
  const footerRows = options.footerRows ?? 0;
  const minTop = Math.max(1, options.minTop ?? 1);

  const availableRows = terminalRows - headerRows - footerRows;
  const centeredTop = headerRows + Math.floor((availableRows - contentRows) / 2) + 1;

  return Math.max(minTop, centeredTop);
}
