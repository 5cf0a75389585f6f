import type { RawDeviceEvent } from '@holdtype/core';
import { keyNameOf } from './keycodes';
import { nativeWordBits } from './procDevices';

const EV_SYN = 0;
const EV_KEY = 1;
const SYN_REPORT = 0;
const SYN_DROPPED = 3;

/** `struct input_event`: a timeval, then u16 type, u16 code, s32 value. */
export const inputEventSize = (wordBits = nativeWordBits()) => (wordBits === 32 ? 16 : 24);

export interface EventDecoderOptions {
  deviceId: string;
  wordBits?: number;
  keyName?: (code: number) => string;
}

export interface EventDecoder {
  /** Decodes whole records; a trailing partial record waits for the next chunk. */
  push(chunk: Uint8Array): RawDeviceEvent[];
}

export const createEventDecoder = (options: EventDecoderOptions): EventDecoder => {
  const wordBits = options.wordBits ?? nativeWordBits();
  const size = inputEventSize(wordBits);
  const keyName = options.keyName ?? keyNameOf;
  let pending: Buffer = Buffer.alloc(0);
  // After SYN_DROPPED the kernel's state is unknown until the next SYN_REPORT.
  let discarding = false;

  const readTimestamp = (record: Buffer) => {
    if (wordBits === 32) {
      return record.readInt32LE(0) * 1000 + Math.floor(record.readInt32LE(4) / 1000);
    }
    const seconds = Number(record.readBigInt64LE(0));
    const micros = Number(record.readBigInt64LE(8));
    return seconds * 1000 + Math.floor(micros / 1000);
  };

  const decode = (record: Buffer): RawDeviceEvent | null => {
    const offset = wordBits === 32 ? 8 : 16;
    const type = record.readUInt16LE(offset);
    const code = record.readUInt16LE(offset + 2);
    const value = record.readInt32LE(offset + 4);
    const timestamp = readTimestamp(record);

    if (type === EV_SYN) {
      if (code === SYN_DROPPED) {
        discarding = true;
        return { type: 'dropped', deviceId: options.deviceId, timestamp };
      }
      if (code === SYN_REPORT) discarding = false;
      return null;
    }
    if (discarding || type !== EV_KEY) return null;
    const action = value === 0 ? 'up' : value === 1 ? 'down' : value === 2 ? 'repeat' : null;
    if (!action) return null;
    return { deviceId: options.deviceId, key: keyName(code), action, timestamp };
  };

  return {
    push(chunk) {
      const data = pending.length ? Buffer.concat([pending, chunk]) : Buffer.from(chunk);
      const events: RawDeviceEvent[] = [];
      let offset = 0;
      for (; offset + size <= data.length; offset += size) {
        const event = decode(data.subarray(offset, offset + size));
        if (event) events.push(event);
      }
      pending = Buffer.from(data.subarray(offset));
      return events;
    },
  };
};
