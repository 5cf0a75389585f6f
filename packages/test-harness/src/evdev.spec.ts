import { describe, expect, it } from 'vitest';
import { createEventDecoder, inputEventSize, keyNameOf } from '@holdtype/platform-linux';

const EV_SYN = 0;
const EV_KEY = 1;
const EV_MSC = 4;

const record64 = (type: number, code: number, value: number, seconds = 1, micros = 500_000) => {
  const buffer = Buffer.alloc(24);
  buffer.writeBigInt64LE(BigInt(seconds), 0);
  buffer.writeBigInt64LE(BigInt(micros), 8);
  buffer.writeUInt16LE(type, 16);
  buffer.writeUInt16LE(code, 18);
  buffer.writeInt32LE(value, 20);
  return buffer;
};

const record32 = (type: number, code: number, value: number, seconds = 2, micros = 250_000) => {
  const buffer = Buffer.alloc(16);
  buffer.writeInt32LE(seconds, 0);
  buffer.writeInt32LE(micros, 4);
  buffer.writeUInt16LE(type, 8);
  buffer.writeUInt16LE(code, 10);
  buffer.writeInt32LE(value, 12);
  return buffer;
};

describe('evdev input_event decoding', () => {
  it('sizes records by word size', () => {
    expect(inputEventSize(64)).toBe(24);
    expect(inputEventSize(32)).toBe(16);
  });

  it('decodes key presses with kernel timestamps', () => {
    const decoder = createEventDecoder({ deviceId: 'event3', wordBits: 64 });
    const events = decoder.push(
      Buffer.concat([record64(EV_MSC, 4, 458807), record64(EV_KEY, 52, 1), record64(EV_SYN, 0, 0)])
    );
    expect(events).toEqual([{ deviceId: 'event3', key: 'dot', action: 'down', timestamp: 1500 }]);
  });

  it('maps values to down, up and repeat', () => {
    const decoder = createEventDecoder({ deviceId: 'event3', wordBits: 64 });
    const events = decoder.push(
      Buffer.concat([record64(EV_KEY, 125, 1), record64(EV_KEY, 125, 2), record64(EV_KEY, 125, 0)])
    );
    expect(events.map((event) => ('action' in event ? event.action : event.type))).toEqual([
      'down',
      'repeat',
      'up',
    ]);
  });

  it('carries a partial record over to the next chunk', () => {
    const decoder = createEventDecoder({ deviceId: 'event3', wordBits: 64 });
    const bytes = record64(EV_KEY, 30, 1);
    expect(decoder.push(bytes.subarray(0, 10))).toEqual([]);
    expect(decoder.push(bytes.subarray(10))).toEqual([
      { deviceId: 'event3', key: 'a', action: 'down', timestamp: 1500 },
    ]);
  });

  it('reports dropped events and skips until the next report', () => {
    const decoder = createEventDecoder({ deviceId: 'event3', wordBits: 64 });
    const events = decoder.push(
      Buffer.concat([
        record64(EV_SYN, 3, 0),
        record64(EV_KEY, 30, 1),
        record64(EV_SYN, 0, 0),
        record64(EV_KEY, 30, 0, 3, 0),
      ])
    );
    expect(events).toEqual([
      { type: 'dropped', deviceId: 'event3', timestamp: 1500 },
      { deviceId: 'event3', key: 'a', action: 'up', timestamp: 3000 },
    ]);
  });

  it('decodes the 32-bit layout', () => {
    const decoder = createEventDecoder({ deviceId: 'event1', wordBits: 32 });
    expect(decoder.push(record32(EV_KEY, 29, 1))).toEqual([
      { deviceId: 'event1', key: 'leftctrl', action: 'down', timestamp: 2250 },
    ]);
  });

  it('names keys missing from the table by code', () => {
    expect(keyNameOf(52)).toBe('dot');
    expect(keyNameOf(126)).toBe('rightmeta');
    expect(keyNameOf(700)).toBe('key_700');
  });
});
