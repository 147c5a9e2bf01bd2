import { DataError } from '../errors.ts';
import type { JsonValue } from './json-value.ts';

export type PathSegment =
  | { kind: 'key'; key: string }
  | { kind: 'index'; index: number; raw: string }
  | { kind: 'badIndex'; raw: string };

export type ResolveFailure = 'NotFound' | 'TypeMismatch';

export type ResolveResult =
  | { ok: true; value: JsonValue }
  | { ok: false; reason: ResolveFailure; message: string };

function bracketSegment(raw: string): PathSegment {
  const inner = raw.slice(1, -1);
  if (/^\d+$/.test(inner)) {
    return { kind: 'index', index: Number(inner), raw };
  }
  return { kind: 'badIndex', raw };
}

/**
 * Split a slash path into segments. A leading `/` is optional and `[n]` may
 * appear anywhere, attached to a key (`items[0]`) or on its own (`items/[0]`).
 */
export function splitPath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  let start = path.startsWith('/') ? 1 : 0;
  let pos = start;

  const pushKey = (end: number) => {
    if (end > start) {
      segments.push({ kind: 'key', key: path.slice(start, end) });
    }
  };

  while (pos < path.length) {
    const ch = path[pos];
    if (ch === '[') {
      const close = path.indexOf(']', pos);
      if (close !== -1) {
        pushKey(pos);
        segments.push(bracketSegment(path.slice(pos, close + 1)));
        pos = close + 1;
        if (path[pos] === '/') {
          pos++;
        }
        start = pos;
        continue;
      }
    }

    if (ch === '/') {
      pushKey(pos);
      start = pos + 1;
    }
    pos++;
  }

  pushKey(path.length);
  return segments;
}

/**
 * Resolves slash paths against parsed JSON documents.
 *
 * Segment lists are memoized per literal path string for the lifetime of the
 * navigator, so one navigator should be shared by every mapping run that uses
 * the same paths. Generation is synchronous and the cache is only touched by
 * a lookup followed by an insert in the same tick, so concurrent runs on the
 * event loop never observe a partially written entry.
 */
export class PathNavigator {
  private cache: Map<string, readonly PathSegment[]> = new Map();

  segments(path: string): readonly PathSegment[] {
    const cached = this.cache.get(path);
    if (cached) {
      return cached;
    }
    const parsed = Object.freeze(splitPath(path));
    this.cache.set(path, parsed);
    return parsed;
  }

  resolve(document: JsonValue, path: string): ResolveResult {
    let current = document;

    for (const segment of this.segments(path)) {
      switch (segment.kind) {
        case 'badIndex':
          return { ok: false, reason: 'TypeMismatch', message: `Invalid array index: ${segment.raw}` };

        case 'index': {
          if (!Array.isArray(current)) {
            return { ok: false, reason: 'TypeMismatch', message: `Expected array at path segment: ${segment.raw}` };
          }
          const next = current[segment.index];
          if (next === undefined) {
            return { ok: false, reason: 'TypeMismatch', message: `Array index out of bounds: ${segment.raw}` };
          }
          current = next;
          break;
        }

        case 'key': {
          if (current === null || typeof current !== 'object' || Array.isArray(current)) {
            return { ok: false, reason: 'TypeMismatch', message: `Expected object at path segment: ${segment.key}` };
          }
          const next = Object.prototype.hasOwnProperty.call(current, segment.key) ? current[segment.key] : undefined;
          if (next === undefined) {
            return { ok: false, reason: 'NotFound', message: `Property not found: ${segment.key}` };
          }
          current = next;
          break;
        }
      }
    }

    return { ok: true, value: current };
  }

  getValue(document: JsonValue, path: string): JsonValue {
    const result = this.resolve(document, path);
    if (!result.ok) {
      throw new DataError(result.message, path);
    }
    return result.value;
  }

  getValueOr<T>(document: JsonValue, path: string, fallback: T): JsonValue | T {
    const result = this.resolve(document, path);
    return result.ok ? result.value : fallback;
  }

  hasPath(document: JsonValue, path: string): boolean {
    return this.resolve(document, path).ok;
  }

  clearCache(): void {
    this.cache.clear();
  }

  cacheSize(): number {
    return this.cache.size;
  }
}
