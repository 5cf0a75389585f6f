import { z } from 'zod';

export const CONFIG_VERSION = 1;

export const ModifierNameSchema = z.enum(['super', 'ctrl', 'alt', 'shift']);
export type ModifierName = z.infer<typeof ModifierNameSchema>;

export const HotkeyConfigSchema = z.object({
  modifiers: z
    .array(ModifierNameSchema)
    .default(['super'])
    .transform((modifiers) => Array.from(new Set(modifiers))),
  key: z.string().trim().min(1).default('period'),
});
export type HotkeyConfig = z.infer<typeof HotkeyConfigSchema>;

const hexId = z
  .string()
  .trim()
  .regex(/^(0x)?[0-9a-fA-F]{1,4}$/, 'expected a hexadecimal id such as 0006 or 0x2333');

export const DeviceFilterConfigSchema = z.object({
  syntheticNamePatterns: z
    .array(z.string().trim().min(1))
    .default(['virtual', 'ydotoold', 'xdotool', 'uinput', 'wtype']),
  syntheticVendorIds: z.array(hexId).default([]),
  syntheticBusTypes: z.array(hexId).default(['0006']),
  ignoredNamePatterns: z
    .array(z.string().trim().min(1))
    .default(['sleep button', 'power button', 'lid switch', 'video bus']),
});
export type DeviceFilterConfig = z.infer<typeof DeviceFilterConfigSchema>;

export const SessionConfigSchema = z.object({
  minHoldMs: z.number().int().min(0).default(50),
  maxRecordingMs: z.number().int().min(0).default(0),
});
export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export const CaptureConfigSchema = z.object({
  recorder: z.enum(['arecord', 'sox', 'rec']).default('arecord'),
  device: z.string().min(1).optional(),
  sampleRate: z.number().int().positive().default(16000),
  /** About 0.3 s of 16 kHz PCM; shorter clips are treated as no audio. */
  minAudioBytes: z.number().int().min(0).default(9956),
  stopTimeoutMs: z.number().int().positive().default(2000),
});
export type CaptureConfig = z.infer<typeof CaptureConfigSchema>;

export const TranscriptionConfigSchema = z.object({
  engine: z.enum(['whisper-cli', 'http']).default('whisper-cli'),
  command: z.string().min(1).default('whisper-cli'),
  model: z.string().min(1).default('base'),
  modelDir: z.string().min(1).optional(),
  language: z.string().trim().min(2).default('en'),
  threads: z.number().int().positive().default(4),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(60000),
});
export type TranscriptionConfig = z.infer<typeof TranscriptionConfigSchema>;

export const ProcessingConfigSchema = z.object({
  removeFillerWords: z.boolean().default(true),
  fillerWords: z.array(z.string().trim().min(1)).default(['um', 'uh', 'er', 'erm', 'hmm']),
  autoCapitalize: z.boolean().default(true),
  capitalizeSentences: z.boolean().default(false),
  autoPunctuate: z.boolean().default(false),
});
export type ProcessingConfig = z.infer<typeof ProcessingConfigSchema>;

export const InjectionConfigSchema = z.object({
  backend: z.enum(['ydotool', 'wtype', 'xdotool']).default('ydotool'),
  delayMs: z.number().int().min(0).default(300),
  timeoutMs: z.number().int().positive().default(10000),
});
export type InjectionConfig = z.infer<typeof InjectionConfigSchema>;

export const NotificationConfigSchema = z.object({
  enabled: z.boolean().default(true),
  expireMs: z.number().int().min(0).default(3000),
  icon: z.string().min(1).default('audio-input-microphone'),
});
export type NotificationConfig = z.infer<typeof NotificationConfigSchema>;

export const DaemonConfigSchema = z.object({
  version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
  hotkey: HotkeyConfigSchema.default({}),
  devices: DeviceFilterConfigSchema.default({}),
  session: SessionConfigSchema.default({}),
  capture: CaptureConfigSchema.default({}),
  transcription: TranscriptionConfigSchema.default({}),
  processing: ProcessingConfigSchema.default({}),
  injection: InjectionConfigSchema.default({}),
  notifications: NotificationConfigSchema.default({}),
});
export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;
