import { access, constants, readdir } from 'fs/promises';
import type { PermissionsAdapter, ToolStatus } from '@holdtype/platform';
import type { InjectionBackend } from './injection';
import { commandExists, processRunning, runCommand, type CommandRunner } from './exec';

export interface LinuxPermissionsOptions {
  devDir?: string;
  recorder: string;
  injection: InjectionBackend;
  transcriptionCommand?: string;
  run?: CommandRunner;
}

const canReadAnyEventNode = async (devDir: string) => {
  let entries: string[];
  try {
    entries = await readdir(devDir);
  } catch {
    return false;
  }
  for (const entry of entries.filter((name) => /^event\d+$/.test(name))) {
    try {
      await access(`${devDir}/${entry}`, constants.R_OK);
      return true;
    } catch {
      continue;
    }
  }
  return false;
};

export const createLinuxPermissions = (options: LinuxPermissionsOptions): PermissionsAdapter => {
  const run = options.run ?? runCommand;
  const devDir = options.devDir ?? '/dev/input';

  const toolStatus = async (name: string): Promise<ToolStatus> => ({
    name,
    available: await commandExists(name, run),
  });

  return {
    async check() {
      const names = [options.recorder, options.injection, 'notify-send'];
      if (options.transcriptionCommand) names.push(options.transcriptionCommand);
      const tools = await Promise.all(names.map(toolStatus));
      if (options.injection === 'ydotool') {
        const daemon = await processRunning('ydotoold', run);
        tools.push({
          name: 'ydotoold',
          available: daemon,
          detail: daemon
            ? undefined
            : 'ydotool daemon not running. Start with: systemctl --user start ydotool',
        });
      }
      return {
        inputDevices: (await canReadAnyEventNode(devDir)) ? 'granted' : 'denied',
        tools,
      };
    },
    requestGuidance() {
      return (
        'Add your user to the input group (sudo usermod -aG input $USER) ' +
        'and log in again to read /dev/input.'
      );
    },
  };
};
