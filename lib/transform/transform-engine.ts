import { TransformError } from '../errors.ts';
import { createLogger } from '../logger.ts';
import type { TransformRule } from '../mapping/types.ts';
import { BUILTIN_TRANSFORMS } from './builtin-transforms.ts';
import type { TransformFunction, TransformParams, TransformValue } from './types.ts';

const logger = createLogger('TransformEngine');

/**
 * Named value transforms applied to extracted scalars. Each engine owns its
 * registry; the built-ins are registered on construction. Register custom
 * functions before the engine is handed to a generator.
 */
export class TransformEngine {
  private transforms: Map<string, TransformFunction> = new Map();

  constructor() {
    for (const [name, fn] of Object.entries(BUILTIN_TRANSFORMS)) {
      this.transforms.set(name, fn);
    }
  }

  register(name: string, fn: TransformFunction): void {
    if (this.transforms.has(name)) {
      logger.debug(`Replacing transform "${name}"`);
    }
    this.transforms.set(name, fn);
  }

  apply(
    name: string,
    value: TransformValue,
    params: TransformParams = {},
    rules: readonly TransformRule[] = []
  ): TransformValue {
    const fn = this.transforms.get(name);
    if (!fn) {
      throw new TransformError(`Transform not found: ${name}`);
    }
    return fn(value, params, rules);
  }

  has(name: string): boolean {
    return this.transforms.has(name);
  }

  names(): string[] {
    return Array.from(this.transforms.keys());
  }
}
