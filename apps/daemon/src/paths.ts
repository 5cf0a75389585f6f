import { homedir } from 'os';
import { join } from 'path';

export const APP_NAME = 'holdtype';

export type Env = Record<string, string | undefined>;

const home = (env: Env) => env.HOME ?? homedir();

export const configDir = (env: Env = process.env) =>
  join(env.XDG_CONFIG_HOME ?? join(home(env), '.config'), APP_NAME);

export const stateDir = (env: Env = process.env) =>
  join(env.XDG_STATE_HOME ?? join(home(env), '.local/state'), APP_NAME);

export const defaultConfigPath = (env: Env = process.env) => join(configDir(env), 'config.json');
