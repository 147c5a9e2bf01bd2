import * as fs from 'fs/promises';
import * as path from 'path';
import { parse as parseYaml, YAMLError } from 'yaml';
import { ConfigError, YamlError } from '../errors.ts';
import { createLogger } from '../logger.ts';
import { createMapping } from './mapping-builder.ts';
import { validateMapping } from './mapping-validator.ts';
import type { GraphMapping } from './types.ts';

const logger = createLogger('MappingLoader');

export interface MappingLoaderOptions {
  /** Run structural validation after building. Defaults to true. */
  validate?: boolean;
}

export class MappingLoader {
  private validate: boolean;

  constructor(options: MappingLoaderOptions = {}) {
    this.validate = options.validate ?? true;
  }

  async loadFile(filePath: string): Promise<GraphMapping> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Failed to read mapping file: ${message}`, path.basename(filePath));
    }

    const mapping = this.parse(content);
    logger.info(
      `Loaded ${path.basename(filePath)}: ${mapping.vertices.length} tag(s), ${mapping.edges.length} edge(s)`
    );
    return mapping;
  }

  parse(content: string): GraphMapping {
    let parsed: unknown;
    try {
      parsed = parseYaml(content);
    } catch (err) {
      if (err instanceof YAMLError) {
        const pos = err.linePos?.[0];
        throw new YamlError(err.message.split('\n')[0] ?? err.message, pos ? { line: pos.line, column: pos.col } : {});
      }
      throw err;
    }

    const mapping = createMapping(parsed ?? {});

    if (this.validate) {
      const issues = validateMapping(mapping);
      const first = issues[0];
      if (first) {
        for (const issue of issues) {
          logger.debug(`${issue.element}: ${issue.message}`);
        }
        throw new ConfigError(first.message, first.element);
      }
    }

    return mapping;
  }
}
