/**
 * `neon-blocks setup`: interactive settings editor
 */

import * as p from '@clack/prompts';
import { THEME_NAMES, themes } from './themes';
import { type Settings, loadSettings, saveSettings, settingsPath } from './settings';

/**
 * Ask for a yes/no setting. Returns null when the user cancels.
 */
async function askToggle(message: string, initialValue: boolean): Promise<boolean | null> {
  const answer = await p.confirm({ message, initialValue });
  if (p.isCancel(answer)) return null;
  return answer;
}

export async function setupCommand(dir?: string): Promise<void> {
  const current = loadSettings(dir);

  p.intro(' neon-blocks setup ');

  const theme = await p.select({
    message: 'Color theme',
    initialValue: current.theme,
    options: THEME_NAMES.map(name => ({ value: name, label: themes[name].name })),
  });
  if (p.isCancel(theme)) {
    p.cancel('Setup cancelled, nothing saved.');
    return;
  }

  const advisor = await askToggle('Show the placement advisor on start?', current.advisor);
  if (advisor === null) {
    p.cancel('Setup cancelled, nothing saved.');
    return;
  }

  const ghost = await askToggle('Show the ghost piece?', current.ghost);
  if (ghost === null) {
    p.cancel('Setup cancelled, nothing saved.');
    return;
  }

  const dynamicDifficulty = await askToggle('Adapt the fall speed to how you play?', current.dynamicDifficulty);
  if (dynamicDifficulty === null) {
    p.cancel('Setup cancelled, nothing saved.');
    return;
  }

  const sound = await askToggle('Ring the terminal bell on clears and game over?', current.sound);
  if (sound === null) {
    p.cancel('Setup cancelled, nothing saved.');
    return;
  }

  const next: Settings = { ...current, theme, advisor, ghost, dynamicDifficulty, sound };

  if (!saveSettings(next, dir)) {
    p.log.error('Settings were not saved.');
    p.outro('Try again once the settings directory is writable.');
    return;
  }

  p.log.success(`Saved ${settingsPath(dir)}`);
  p.outro('Run neon-blocks to play.');
}
