/**
 * Shared command setup: configuration, logger, and one recorder connection
 * per command run.
 */

import chalk from 'chalk';
import {
  checkSchemaVersion,
  createConnection,
  createLogger,
  createRecorderStore,
  loadConfig,
  resolveDatabasePath,
  setLogger,
  type Logger,
  type RecorderConfig,
  type RecorderStore,
  type SchemaCheck,
} from '@recstat/core';

/**
 * Options every command accepts
 */
export interface GlobalOptions {
  dbUrl?: string;
  verbose?: boolean;
  /** Working directory for relative paths and the config file */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RecorderContext {
  store: RecorderStore;
  config: RecorderConfig;
  logger: Logger;
  schema: SchemaCheck;
}

export function createCommandLogger(config: RecorderConfig, verbose?: boolean): Logger {
  const logger = createLogger('recstat', {
    minSeverity: verbose ? 'DEBUG' : config.logging.level,
    prettyPrint: config.logging.pretty,
  });
  setLogger(logger);
  return logger;
}

/**
 * Open the recorder, run `fn`, close the connection on every exit path
 *
 * Prints a warning when the recorder schema is newer than the known one.
 */
export async function withRecorder<T>(
  options: GlobalOptions,
  fn: (context: RecorderContext) => T | Promise<T>
): Promise<T> {
  const cwd = options.cwd ?? process.cwd();
  const config = loadConfig({ env: options.env, cwd });
  const logger = createCommandLogger(config, options.verbose);

  const url = options.dbUrl ?? config.database.url;
  const path = resolveDatabasePath(url, cwd);
  const connection = createConnection({ path });

  try {
    const store = createRecorderStore(connection.getConnection());
    logger.debug('Opened recorder database', { url, path });

    const schema = checkSchemaVersion(store.getSchemaVersion());
    if (schema.warning) {
      console.error(chalk.yellow(`Warning: ${schema.warning}`));
    }

    return await fn({ store, config, logger, schema });
  } finally {
    connection.close();
  }
}
