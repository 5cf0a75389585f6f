import { InjectionError, delay, toErrorMessage, type TextInjector } from '@holdtype/core';
import { runCommand, type CommandRunner } from './exec';

export type InjectionBackend = 'ydotool' | 'wtype' | 'xdotool';

export interface TypingInjectorOptions {
  backend: InjectionBackend;
  /** Pause before typing so focus returns to the target window. */
  delayMs: number;
  run?: CommandRunner;
}

export const buildTypeCommand = (backend: InjectionBackend, text: string): [string, string[]] => {
  switch (backend) {
    case 'ydotool':
      return ['ydotool', ['type', '--', text]];
    case 'wtype':
      return ['wtype', ['--', text]];
    case 'xdotool':
      return ['xdotool', ['type', '--clearmodifiers', '--', text]];
  }
};

export const createTypingInjector = (options: TypingInjectorOptions): TextInjector => {
  const run = options.run ?? runCommand;
  return {
    async inject(text, signal) {
      if (!text) return;
      if (options.delayMs > 0) await delay(options.delayMs, signal);
      const [command, args] = buildTypeCommand(options.backend, text);
      try {
        await run(command, args, { signal });
      } catch (error) {
        if (signal.aborted) throw error;
        throw new InjectionError(`${command} failed: ${toErrorMessage(error)}`, { cause: error });
      }
    },
  };
};
