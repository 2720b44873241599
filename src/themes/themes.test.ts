import { describe, it, expect } from 'vitest';
import { THEME_NAMES, themes, isThemeName, nextTheme, hexToRgb, hexToAnsi, getAnsiColor } from './index';
import { PIECE_KINDS } from '../game/shapes';

describe('themes', () => {
  it('defines every color for every theme', () => {
    for (const name of THEME_NAMES) {
      const theme = themes[name];
      for (const hex of [theme.background, theme.grid, theme.border, theme.text, theme.ui, theme.uiBackground]) {
        expect(hex).toMatch(/^#[0-9A-F]{6}$/);
      }
      for (const kind of PIECE_KINDS) {
        expect(theme.pieces[kind]).toMatch(/^#[0-9A-F]{6}$/);
      }
    }
  });

  it('recognises theme names', () => {
    expect(isThemeName('retro')).toBe(true);
    expect(isThemeName('amber')).toBe(false);
  });

  it('cycles through the themes and wraps around', () => {
    expect(nextTheme('neon')).toBe('dark');
    expect(nextTheme('dark')).toBe('retro');
    expect(nextTheme('retro')).toBe('neon');
  });
});

describe('ANSI conversion', () => {
  it('splits a hex color into channels', () => {
    expect(hexToRgb('#00C8FF')).toEqual([0, 200, 255]);
    expect(hexToRgb('FFA500')).toEqual([255, 165, 0]);
  });

  it('builds foreground and background escapes', () => {
    expect(hexToAnsi('#FF3232')).toBe('\x1b[38;2;255;50;50m');
    expect(hexToAnsi('#FF3232', 'bg')).toBe('\x1b[48;2;255;50;50m');
  });

  it('uses the ui color as the accent', () => {
    expect(getAnsiColor('neon')).toBe('\x1b[38;2;0;200;255m');
    expect(getAnsiColor('retro')).toBe('\x1b[38;2;255;255;255m');
  });
});
