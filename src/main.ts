#!/usr/bin/env node
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { runExport } from './walker.js';
import { describeError } from './errors.js';

/**
 * Run a conversion: `anvil2vault --config=config.yaml`
 */
async function bootstrap(): Promise<number> {
  const args = process.argv.slice(2);
  const configArg = args.find(a => a.startsWith('--config='));
  const configPath = configArg ? configArg.slice('--config='.length) : 'config.yaml';

  const config = await loadConfig(configPath);
  const logger = createLogger(config.debug ? 'debug' : 'info');

  logger.info(`Converting ${config.sourceDir} -> ${config.destinationDir}`);
  const summary = await runExport(config, logger);

  return summary.skipped.length > 0 ? 1 : 0;
}

bootstrap()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(describeError(err));
    process.exitCode = 1;
  });
