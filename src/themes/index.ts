/**
 * Color themes
 *
 * A closed set of presets. Colors are stored as hex and converted to
 * 24-bit ANSI escapes for the terminal.
 */

import type { PiecePalette } from '../game/shapes';

/**
 * Available theme identifiers
 */
export const THEME_NAMES = ['neon', 'dark', 'retro'] as const;
export type ThemeName = (typeof THEME_NAMES)[number];

/**
 * Theme color definition
 */
export interface ThemeColors {
  /** Display name */
  name: string;
  /** Screen background (hex) */
  background: string;
  /** Empty board cells (hex) */
  grid: string;
  /** Board frame (hex) */
  border: string;
  /** Body text (hex) */
  text: string;
  /** Panel accents, menus, highlights (hex) */
  ui: string;
  /** Panel fill (hex) */
  uiBackground: string;
  /** Per-kind piece colors (hex) */
  pieces: PiecePalette;
}

export const themes: Record<ThemeName, ThemeColors> = {
  neon: {
    name: 'Neon',
    background: '#00001E',
    grid: '#14143C',
    border: '#00C8FF',
    text: '#00FFFF',
    ui: '#00C8FF',
    uiBackground: '#00003C',
    pieces: {
      I: '#00FFFF',
      J: '#3296FF',
      L: '#FFA500',
      O: '#FFFF00',
      S: '#32FF32',
      T: '#C832FF',
      Z: '#FF3232',
    },
  },
  dark: {
    name: 'Dark',
    background: '#141414',
    grid: '#282828',
    border: '#646464',
    text: '#C8C8C8',
    ui: '#969696',
    uiBackground: '#1E1E1E',
    pieces: {
      I: '#00B4B4',
      J: '#0000B4',
      L: '#B46400',
      O: '#B4B400',
      S: '#00B400',
      T: '#640064',
      Z: '#B40000',
    },
  },
  retro: {
    name: 'Retro',
    background: '#000000',
    grid: '#1E1E1E',
    border: '#FFFFFF',
    text: '#FFFFFF',
    ui: '#FFFFFF',
    uiBackground: '#000000',
    pieces: {
      I: '#AAAAAA',
      J: '#6464FF',
      L: '#FF6464',
      O: '#FFFF64',
      S: '#64FF64',
      T: '#FF64FF',
      Z: '#FFAA64',
    },
  },
};

export function isThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some(name => name === value);
}

/**
 * Next theme in display order, wrapping around
 */
export function nextTheme(current: ThemeName): ThemeName {
  const index = THEME_NAMES.indexOf(current);
  return THEME_NAMES[(index + 1) % THEME_NAMES.length];
}

// ============================================================================
// ANSI conversion
// ============================================================================

export function hexToRgb(hex: string): [number, number, number] {
  const clean = hex.replace(/^#/, '');
  return [
    parseInt(clean.slice(0, 2), 16),
    parseInt(clean.slice(2, 4), 16),
    parseInt(clean.slice(4, 6), 16),
  ];
}

/**
 * 24-bit color escape for a hex color.
 * `fg` sets the text color, `bg` the cell background.
 */
export function hexToAnsi(hex: string, layer: 'fg' | 'bg' = 'fg'): string {
  const [r, g, b] = hexToRgb(hex);
  return `\x1b[${layer === 'fg' ? 38 : 48};2;${r};${g};${b}m`;
}

/**
 * Accent color escape for a theme (menus, borders, labels)
 */
export function getAnsiColor(mode: ThemeName): string {
  return hexToAnsi(themes[mode].ui);
}
