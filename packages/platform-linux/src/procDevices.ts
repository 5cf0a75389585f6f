import { readFile } from 'fs/promises';
import type { InputDevice } from '@holdtype/core';

export const PROC_INPUT_DEVICES = '/proc/bus/input/devices';

const EV_KEY = 1;
/** Codes from BTN_MISC (0x100) up are mouse, joystick and touch buttons. */
const FIRST_BUTTON_CODE = 0x100;

export interface ProcInputEntry {
  bus?: string;
  vendor?: string;
  product?: string;
  name: string;
  handlers: string[];
  bitmaps: Record<string, string>;
}

export const nativeWordBits = (arch: string = process.arch) =>
  arch === 'arm' || arch === 'ia32' || arch === 'mips' || arch === 'mipsel' ? 32 : 64;

/** Kernel bitmaps are printed as hex words, most significant word first. */
export const bitmapHas = (bitmap: string | undefined, bit: number, wordBits = nativeWordBits()) => {
  if (!bitmap) return false;
  const words = bitmap.trim().split(/\s+/).reverse();
  const word = words[Math.floor(bit / wordBits)];
  if (!word) return false;
  return ((BigInt(`0x${word}`) >> BigInt(bit % wordBits)) & 1n) === 1n;
};

export const bitmapHasAnyBelow = (
  bitmap: string | undefined,
  limit: number,
  wordBits = nativeWordBits()
) => {
  if (!bitmap) return false;
  const words = bitmap.trim().split(/\s+/).reverse();
  return words.some((word, index) => {
    const base = index * wordBits;
    if (base >= limit) return false;
    const value = BigInt(`0x${word}`);
    const span = Math.min(wordBits, limit - base);
    return (value & ((1n << BigInt(span)) - 1n)) !== 0n;
  });
};

const parseIdentity = (line: string, entry: ProcInputEntry) => {
  for (const pair of line.split(/\s+/)) {
    const [key, value] = pair.split('=');
    if (!value) continue;
    if (key === 'Bus') entry.bus = value.toLowerCase();
    if (key === 'Vendor') entry.vendor = value.toLowerCase();
    if (key === 'Product') entry.product = value.toLowerCase();
  }
};

export const parseProcInputDevices = (content: string): ProcInputEntry[] =>
  content
    .split(/\n\s*\n/)
    .map((block) => block.trim())
    .filter(Boolean)
    .map((block) => {
      const entry: ProcInputEntry = { name: '', handlers: [], bitmaps: {} };
      for (const line of block.split('\n')) {
        const match = line.match(/^([A-Z]):\s?(.*)$/);
        if (!match) continue;
        const [, tag, rest] = match;
        if (tag === 'I') parseIdentity(rest, entry);
        if (tag === 'N') entry.name = rest.replace(/^Name=/, '').replace(/^"(.*)"$/, '$1');
        if (tag === 'H') {
          entry.handlers = rest.replace(/^Handlers=/, '').split(/\s+/).filter(Boolean);
        }
        if (tag === 'B') {
          const [key, value] = rest.split('=');
          if (key && value !== undefined) entry.bitmaps[key] = value;
        }
      }
      return entry;
    });

/** Entries without an event handler cannot be read and are left out. */
export const toInputDevices = (
  entries: ProcInputEntry[],
  options: { devDir?: string; wordBits?: number } = {}
): InputDevice[] => {
  const devDir = options.devDir ?? '/dev/input';
  const wordBits = options.wordBits ?? nativeWordBits();
  return entries.flatMap((entry) => {
    const handler = entry.handlers.find((name) => /^event\d+$/.test(name));
    if (!handler) return [];
    const reportsKeys =
      bitmapHas(entry.bitmaps.EV, EV_KEY, wordBits) &&
      bitmapHasAnyBelow(entry.bitmaps.KEY, FIRST_BUTTON_CODE, wordBits);
    return [
      {
        id: handler,
        name: entry.name,
        path: `${devDir}/${handler}`,
        bus: entry.bus,
        vendor: entry.vendor,
        product: entry.product,
        reportsKeys,
      },
    ];
  });
};

export const readInputDevices = async (procPath = PROC_INPUT_DEVICES) =>
  toInputDevices(parseProcInputDevices(await readFile(procPath, 'utf8')));
