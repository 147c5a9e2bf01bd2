import { loadConfig } from '../../../lib/config.ts';
import { GraphConverter, statementsOf } from '../../../lib/converter.ts';
import { ConfigError, describeError } from '../../../lib/errors.ts';
import { setLogLevel } from '../../../lib/logger.ts';

export const USAGE = 'ngql-mapper <mapping.yaml> <input.json> [--schema-only] [--with-indexes] [--batch-size N]';

export interface ConvertArgs {
  mappingPath: string;
  inputPath: string;
  schemaOnly: boolean;
  withIndexes: boolean;
  batchSize?: number;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const consoleIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function parseBatchSize(raw: string | undefined): number {
  const size = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isInteger(size) || size <= 0) {
    throw new ConfigError(`Invalid batch size: ${raw ?? '(missing)'}`);
  }
  return size;
}

export function parseConvertArgs(args: string[]): ConvertArgs {
  const positional: string[] = [];
  let schemaOnly = false;
  let withIndexes = false;
  let batchSize: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--schema-only') {
      schemaOnly = true;
    } else if (arg === '--with-indexes') {
      withIndexes = true;
    } else if (arg === '--batch-size') {
      batchSize = parseBatchSize(args[++i]);
    } else if (arg.startsWith('--batch-size=')) {
      batchSize = parseBatchSize(arg.slice('--batch-size='.length));
    } else if (arg.startsWith('--')) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [mappingPath, inputPath, ...extra] = positional;
  if (!mappingPath || !inputPath || extra.length > 0) {
    throw new ConfigError(`Usage: ${USAGE}`);
  }

  return { mappingPath, inputPath, schemaOnly, withIndexes, ...(batchSize !== undefined ? { batchSize } : {}) };
}

/**
 * Run one conversion and print the statements, one per line. Returns the
 * process exit code; on failure only the diagnostic line is written.
 */
export async function convertCommand(
  args: string[],
  io: CliIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const options = parseConvertArgs(args);
    const config = loadConfig(env);
    setLogLevel(config.logLevel);
    const converter = new GraphConverter();

    const result = await converter.convertFiles(options.mappingPath, options.inputPath, {
      schemaOnly: options.schemaOnly,
      batchSize: options.batchSize ?? config.batchSize,
    });

    for (const statement of statementsOf(result, { withIndexes: options.withIndexes })) {
      io.stdout(statement);
    }
    return 0;
  } catch (err) {
    io.stderr(describeError(err));
    return 1;
  }
}
