import keycodes from './keycodes.json';

const entries = Object.entries(keycodes).map(
  ([code, name]): [number, string] => [Number(code), name]
);

/** evdev key code to lowercase key name (`KEY_DOT` is `dot`). */
export const KEY_CODE_NAMES: ReadonlyMap<number, string> = new Map(entries);

export const KEY_NAMES: ReadonlySet<string> = new Set(KEY_CODE_NAMES.values());

export const keyNameOf = (code: number) => KEY_CODE_NAMES.get(code) ?? `key_${code}`;
