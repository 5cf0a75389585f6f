import type { ResolvedHotkey } from './keys';
import type {
  HoldAbortReason,
  HotkeySignal,
  HotkeySnapshot,
  HotkeyState,
  HotkeyTransition,
  KeyEvent,
} from './types';

export interface HotkeyStateMachineOptions {
  hotkey: ResolvedHotkey;
  /** Holds shorter than this abort as too-short instead of committing. */
  minHoldMs: number;
  onTransition?: (transition: HotkeyTransition) => void;
}

export interface HotkeyStateMachine {
  getState(): HotkeyState;
  handle(event: KeyEvent): HotkeySignal[];
  /** Implicit release of every key the device reported, e.g. on unplug. */
  releaseDevice(deviceId: string, timestamp: number): HotkeySignal[];
  reset(): void;
  snapshot(): HotkeySnapshot;
}

type Trigger =
  | { kind: 'key'; key: string; action: 'down' | 'up'; targetWasHeld: boolean }
  | { kind: 'lost' };

export const createHotkeyStateMachine = ({
  hotkey,
  minHoldMs,
  onTransition,
}: HotkeyStateMachineOptions): HotkeyStateMachine => {
  let state: HotkeyState = 'idle';
  let holdId = 0;
  let armedAt = 0;
  // Per-device held keys; decisions use the union so no shared counter can drift.
  const heldByDevice = new Map<string, Set<string>>();

  const isHeld = (key: string) => {
    for (const keys of heldByDevice.values()) {
      if (keys.has(key)) return true;
    }
    return false;
  };

  const modifiersSatisfied = () =>
    hotkey.modifiers.every((modifier) => Array.from(modifier.keys).some(isHeld));

  const setState = (next: HotkeyState, timestamp: number) => {
    if (next === state) return;
    const from = state;
    state = next;
    onTransition?.({ from, to: next, timestamp });
  };

  const settle = (timestamp: number) => {
    if (state !== 'committing') return;
    setState(modifiersSatisfied() ? 'modifiersHeld' : 'idle', timestamp);
  };

  const abort = (reason: HoldAbortReason, timestamp: number): HotkeySignal => ({
    type: 'sessionAbort',
    holdId,
    timestamp,
    reason,
    heldMs: Math.max(0, timestamp - armedAt),
  });

  const evaluate = (trigger: Trigger, timestamp: number): HotkeySignal[] => {
    const satisfied = modifiersSatisfied();

    if (state === 'armed') {
      const targetHeld = isHeld(hotkey.key);
      if (targetHeld && satisfied) return [];
      if (trigger.kind === 'lost') {
        setState(satisfied ? 'committing' : 'idle', timestamp);
        return [abort('device-lost', timestamp)];
      }
      if (!targetHeld) {
        setState('committing', timestamp);
        const heldMs = Math.max(0, timestamp - armedAt);
        if (heldMs < minHoldMs) {
          return [abort('too-short', timestamp)];
        }
        return [{ type: 'sessionCommit', holdId, timestamp, heldMs }];
      }
      setState('idle', timestamp);
      return [abort('modifier-released-early', timestamp)];
    }

    setState(satisfied ? 'modifiersHeld' : 'idle', timestamp);
    if (
      satisfied &&
      trigger.kind === 'key' &&
      trigger.action === 'down' &&
      trigger.key === hotkey.key &&
      !trigger.targetWasHeld
    ) {
      holdId += 1;
      armedAt = timestamp;
      setState('armed', timestamp);
      return [{ type: 'sessionStart', holdId, timestamp }];
    }
    return [];
  };

  const handle = (event: KeyEvent): HotkeySignal[] => {
    if (event.action === 'repeat') return [];
    settle(event.timestamp);

    const targetWasHeld = isHeld(hotkey.key);
    let keys = heldByDevice.get(event.deviceId);
    if (event.action === 'down') {
      if (!keys) {
        keys = new Set();
        heldByDevice.set(event.deviceId, keys);
      }
      if (keys.has(event.key)) return [];
      keys.add(event.key);
    } else {
      if (!keys?.has(event.key)) return [];
      keys.delete(event.key);
      if (keys.size === 0) heldByDevice.delete(event.deviceId);
    }

    return evaluate(
      { kind: 'key', key: event.key, action: event.action, targetWasHeld },
      event.timestamp
    );
  };

  const releaseDevice = (deviceId: string, timestamp: number): HotkeySignal[] => {
    settle(timestamp);
    if (!heldByDevice.delete(deviceId)) return [];
    return evaluate({ kind: 'lost' }, timestamp);
  };

  const reset = () => {
    heldByDevice.clear();
    armedAt = 0;
    state = 'idle';
  };

  const snapshot = (): HotkeySnapshot => ({
    state,
    holdId,
    heldModifiers: hotkey.modifiers
      .filter((modifier) => Array.from(modifier.keys).some(isHeld))
      .map((modifier) => modifier.name),
    targetHeld: isHeld(hotkey.key),
    devices: heldByDevice.size,
  });

  return {
    getState: () => state,
    handle,
    releaseDevice,
    reset,
    snapshot,
  };
};
