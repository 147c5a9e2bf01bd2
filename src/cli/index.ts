#!/usr/bin/env node
import dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { describeError } from '../../lib/errors.ts';

// Load .env from the working directory before anything creates a logger
const cliEnvPath = path.join(process.cwd(), '.env');
if (fs.existsSync(cliEnvPath)) {
  dotenv.config({ path: cliEnvPath });
}

const args = process.argv.slice(2);

function showHelp(): void {
  console.log(`
ngql-mapper

Generates NebulaGraph nGQL statements from a JSON document and a YAML mapping.

Usage:
  ngql-mapper <mapping.yaml> <input.json> [options]

Options:
  --schema-only     Print only schema statements, no data
  --with-indexes    Also print CREATE TAG/EDGE INDEX statements after the schema
  --batch-size N    Tuples per INSERT statement (default: $NGQL_BATCH_SIZE or 500)
  --help, -h        Show this help message

Environment:
  LOG_LEVEL         pino log level for diagnostics on stderr (default: info)
  NGQL_BATCH_SIZE   Default batch size

Examples:
  ngql-mapper mapping.yaml data.json > import.ngql
  ngql-mapper mapping.yaml data.json --schema-only
`);
}

async function main(): Promise<void> {
  if (args.length === 0 || args.includes('--help') || args.includes('-h') || args[0] === 'help') {
    showHelp();
    return;
  }

  try {
    const { convertCommand } = await import('./commands/convert.ts');
    process.exitCode = await convertCommand(args);
  } catch (error) {
    console.error(describeError(error));
    process.exitCode = 1;
  }
}

await main();
