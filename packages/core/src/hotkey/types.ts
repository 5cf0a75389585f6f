import type { ModifierName } from '../domain/schemas';

export type KeyAction = 'down' | 'up' | 'repeat';

export interface KeyEvent {
  deviceId: string;
  key: string;
  action: KeyAction;
  /** Milliseconds, taken from the kernel event time. */
  timestamp: number;
}

export type HotkeyState = 'idle' | 'modifiersHeld' | 'armed' | 'committing';

export type HoldAbortReason = 'modifier-released-early' | 'too-short' | 'device-lost';

export type HotkeySignal =
  | { type: 'sessionStart'; holdId: number; timestamp: number }
  | { type: 'sessionCommit'; holdId: number; timestamp: number; heldMs: number }
  | {
      type: 'sessionAbort';
      holdId: number;
      timestamp: number;
      reason: HoldAbortReason;
      heldMs: number;
    };

export interface HotkeyTransition {
  from: HotkeyState;
  to: HotkeyState;
  timestamp: number;
}

export interface HotkeySnapshot {
  state: HotkeyState;
  holdId: number;
  heldModifiers: ModifierName[];
  targetHeld: boolean;
  devices: number;
}
