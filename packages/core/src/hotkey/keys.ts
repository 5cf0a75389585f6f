import { ConfigError } from '../errors';
import type { HotkeyConfig, ModifierName } from '../domain/schemas';

/** Physical keys that satisfy each modifier. Either side counts. */
export const MODIFIER_KEYS: Record<ModifierName, readonly string[]> = {
  super: ['leftmeta', 'rightmeta'],
  ctrl: ['leftctrl', 'rightctrl'],
  alt: ['leftalt', 'rightalt'],
  shift: ['leftshift', 'rightshift'],
};

const KEY_ALIASES: Record<string, string> = {
  period: 'dot',
  '.': 'dot',
  ',': 'comma',
  '/': 'slash',
  ';': 'semicolon',
  "'": 'apostrophe',
  '`': 'grave',
  '-': 'minus',
  '=': 'equal',
  escape: 'esc',
  return: 'enter',
  del: 'delete',
  ins: 'insert',
  pgup: 'pageup',
  pgdn: 'pagedown',
  printscreen: 'sysrq',
};

export const normalizeKeyName = (name: string) => {
  const lower = name.trim().toLowerCase();
  return KEY_ALIASES[lower] ?? lower;
};

const capitalize = (value: string) =>
  value ? `${value[0].toUpperCase()}${value.slice(1)}` : value;

export interface ResolvedModifier {
  name: ModifierName;
  keys: ReadonlySet<string>;
}

export interface ResolvedHotkey {
  modifiers: ResolvedModifier[];
  key: string;
  display: string;
}

/**
 * Turns the configured hotkey into key names the state machine compares
 * against. When the platform's key table is supplied, unknown keys are
 * rejected.
 */
export const resolveHotkey = (
  config: HotkeyConfig,
  knownKeys?: ReadonlySet<string>
): ResolvedHotkey => {
  const key = normalizeKeyName(config.key);
  if (!key) {
    throw new ConfigError('Hotkey key must not be empty');
  }
  if (knownKeys && !knownKeys.has(key)) {
    throw new ConfigError(`Unsupported hotkey key: ${config.key}`);
  }
  const modifiers = config.modifiers.map((name) => ({
    name,
    keys: new Set(MODIFIER_KEYS[name]),
  }));
  if (modifiers.some((modifier) => modifier.keys.has(key))) {
    throw new ConfigError(`Hotkey key ${config.key} is also one of its required modifiers`);
  }
  const display = [...config.modifiers.map(capitalize), capitalize(config.key.trim())].join('+');
  return { modifiers, key, display };
};
