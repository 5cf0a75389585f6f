import { parseArgs } from 'util';
import { ConfigError, toErrorMessage } from '@holdtype/core';
import { createLinuxAdapter } from '@holdtype/platform-linux';
import { applyEnv, applyOverrides, loadConfig } from './config';
import { createDaemon, listDevices } from './daemon';
import { recordError } from './diagnostics';
import log, { configureLogging, scopedLogger } from './logger';
import { defaultConfigPath } from './paths';

const USAGE = `Usage: holdtype [options]

Hold the configured hotkey to dictate; release it to type the transcription.

Options:
  -c, --config <path>    Config file (default: ${defaultConfigPath()})
  -d, --debug            Log every key event
  -v, --verbose          Log informational messages
      --language <code>  Transcription language, or "auto"
      --model <name>     Whisper model name
      --list-devices     Show input devices and whether they are monitored
  -h, --help             Show this help`;

const parseCli = (argv: string[]) =>
  parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      debug: { type: 'boolean', short: 'd', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      language: { type: 'string' },
      model: { type: 'string' },
      'list-devices': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  }).values;

const main = async (argv: string[]) => {
  let args: ReturnType<typeof parseCli>;
  try {
    args = parseCli(argv);
  } catch (error) {
    console.error(toErrorMessage(error));
    console.error(USAGE);
    return 2;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  configureLogging({ debug: args.debug, verbose: args.verbose });
  const startup = scopedLogger('startup');

  const config = applyEnv(
    applyOverrides(loadConfig(args.config ?? defaultConfigPath()), {
      language: args.language,
      model: args.model,
    })
  );
  const platform = createLinuxAdapter({ config, logger: scopedLogger });

  if (args['list-devices']) {
    (await listDevices(config, platform)).forEach((line) => console.log(line));
    return 0;
  }

  const status = await platform.permissions.check();
  if (status.inputDevices === 'denied') {
    startup.warn(`Cannot read input devices. ${platform.permissions.requestGuidance()}`);
  }
  status.tools
    .filter((tool) => !tool.available)
    .forEach((tool) => startup.warn(tool.detail ?? `${tool.name} not found on PATH`));

  const daemon = createDaemon({ config, platform, logger: scopedLogger, onError: recordError });

  const shutdown = (signal: string) => {
    startup.info(`Received ${signal}, shutting down`);
    daemon.stop().catch((error: unknown) => {
      startup.error(`Shutdown failed: ${toErrorMessage(error)}`);
      process.exit(1);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  startup.info(`holdtype started with ${platform.transcription.id}`);
  await daemon.run();
  return 0;
};

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (error instanceof ConfigError) {
      log.error(`Configuration error: ${error.message}`);
    } else {
      log.error(`Fatal: ${toErrorMessage(error)}`);
    }
    recordError(error);
    process.exit(1);
  }
);
