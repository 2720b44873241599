/**
 * Player settings
 *
 * Stored as JSON under ~/.neon-blocks/ and validated on load. Command-line
 * flags override the saved values for a single run.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { THEME_NAMES, isThemeName } from './themes';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const settingsSchema = z.object({
  theme: z.enum(THEME_NAMES).default('neon'),
  advisor: z.boolean().default(false),
  ghost: z.boolean().default(true),
  dynamicDifficulty: z.boolean().default(true),
  sound: z.boolean().default(true),
  seed: z.number().int().optional(),
});

export type Settings = z.infer<typeof settingsSchema>;

export const DEFAULT_SETTINGS: Settings = settingsSchema.parse({});

export const SETTINGS_DIR = resolve(homedir(), '.neon-blocks');
const SETTINGS_FILE = 'settings.json';

export function settingsPath(dir: string = SETTINGS_DIR): string {
  return resolve(dir, SETTINGS_FILE);
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

/**
 * Read saved settings. A missing file gives the defaults; an unreadable or
 * invalid one gives the defaults with a warning.
 */
export function loadSettings(dir: string = SETTINGS_DIR): Settings {
  const file = settingsPath(dir);
  if (!existsSync(file)) return { ...DEFAULT_SETTINGS };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    console.warn(`[Settings] Could not read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return { ...DEFAULT_SETTINGS };
  }

  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    console.warn(`[Settings] Ignoring invalid ${file}: ${issues}`);
    return { ...DEFAULT_SETTINGS };
  }
  return parsed.data;
}

/**
 * Write settings, creating the directory if needed.
 * Returns false (after a warning) when the file cannot be written.
 */
export function saveSettings(settings: Settings, dir: string = SETTINGS_DIR): boolean {
  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(settingsPath(dir), JSON.stringify(settingsSchema.parse(settings), null, 2) + '\n');
    return true;
  } catch (err) {
    console.warn(`[Settings] Could not save ${settingsPath(dir)}: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

export type CliCommand = 'play' | 'setup';

export interface ParsedArgs {
  command: CliCommand;
  overrides: Partial<Settings>;
  help: boolean;
  listThemes: boolean;
  /** Set when the arguments cannot be used; the CLI prints it and exits 1 */
  error?: string;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = { command: 'play', overrides: {}, help: false, listThemes: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--themes':
        result.listThemes = true;
        break;
      case '--advisor':
        result.overrides.advisor = true;
        break;
      case '--no-ghost':
        result.overrides.ghost = false;
        break;
      case '--static-difficulty':
        result.overrides.dynamicDifficulty = false;
        break;
      case '--mute':
        result.overrides.sound = false;
        break;
      case '--theme': {
        const value: string | undefined = argv[++i];
        if (value === undefined || !isThemeName(value)) {
          result.error = `Unknown theme: ${value ?? '(missing)'}. Available themes: ${THEME_NAMES.join(', ')}`;
          return result;
        }
        result.overrides.theme = value;
        break;
      }
      case '--seed': {
        const value: string | undefined = argv[++i];
        const seed = value === undefined ? NaN : Number(value);
        if (!Number.isInteger(seed)) {
          result.error = `Invalid seed: ${value ?? '(missing)'}. Expected an integer.`;
          return result;
        }
        result.overrides.seed = seed;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          result.error = `Unknown option: ${arg}`;
          return result;
        }
        positional.push(arg);
    }
  }

  if (positional.length > 0) {
    if (positional[0] !== 'setup' || positional.length > 1) {
      result.error = `Unknown command: ${positional.join(' ')}`;
      return result;
    }
    result.command = 'setup';
  }

  return result;
}

export function resolveSettings(saved: Settings, overrides: Partial<Settings>): Settings {
  return { ...saved, ...overrides };
}
