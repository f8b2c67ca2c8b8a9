/**
 * Filter entry point, with its process I/O passed in
 */

import { loadConfig } from './config.js';
import { applyJSONFilter, type FilterAction } from './filter.js';
import { createLogger, type LogSink } from './logger.js';
import { addTabAttr } from './table-attr.js';

export interface RunOptions {
  /** Command-line arguments after the script name; Pandoc passes the output format first */
  argv: string[];
  env: Record<string, string | undefined>;
  readInput: () => Promise<string>;
  writeOutput: (text: string) => void;
  logSink?: LogSink;
}

/**
 * Filter one document from input to output.
 *
 * @returns the process exit code
 */
export async function run(options: RunOptions): Promise<number> {
  const { config, warnings } = loadConfig(options.env);
  const logger = createLogger(config.logLevel, options.logSink);
  for (const warning of warnings) {
    logger.warn(warning);
  }

  const format = options.argv[0] ?? '';
  let rewritten = 0;
  const action: FilterAction = (key, value, fmt, meta) => {
    const table = addTabAttr(key, value, fmt, meta);
    if (table !== null) {
      rewritten += 1;
      const [id, classes, keyvals] = table.c[0];
      logger.debug(
        `table ${rewritten}: id=${JSON.stringify(id)} classes=${JSON.stringify(classes)} ` +
        `keyvals=${JSON.stringify(keyvals)}`
      );
    }
    return table;
  };

  try {
    const source = await options.readInput();
    const output = applyJSONFilter([action], source, format);
    options.writeOutput(output);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  logger.info(`added attributes to ${rewritten} table(s)`);
  return 0;
}
