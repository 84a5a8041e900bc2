
let verbose = true;

export function setVerbose(enable: boolean): void {
  verbose = enable;
}

export function error(message: string) {
  console.error(`Error: ${message}`)
}

export function warn(message: string) {
  console.error(`Warning: ${message}`)
}

export function info(message: string) {
  if (verbose) {
    console.error(`Info: ${message}`)
  }
}

export function fatal(message: string): never {
  console.error(`Fatal: ${message}`)
  process.exit(1);
}

/**
 * Visits every value reachable from `value` exactly once, in pre-order.
 *
 * Values returned by `expand` are visited in the order they were returned,
 * so that traversals over ordered structures stay deterministic.
 */
export function *depthFirstSearch<T>(value: T, expand: (value: T) => Iterable<T>, includeSelf = true): IterableIterator<T> {
  const visited = new Set<T>();
  const stack: T[] = [ value ];
  while (stack.length > 0) {
    const currValue = stack.pop()!;
    if (visited.has(currValue)) {
      continue;
    }
    visited.add(currValue);
    if (includeSelf || currValue !== value) {
      yield currValue;
    }
    const newValues = [...expand(currValue)];
    for (let i = newValues.length-1; i >= 0; i--) {
      stack.push(newValues[i]);
    }
  }
}

/**
 * Returns the elements of `values` without duplicates, keeping the first
 * occurrence of each element.
 */
export function uniqueBy<T>(values: Iterable<T>, getKey: (value: T) => string): T[] {
  const seen = new Set<string>();
  const result = [];
  for (const value of values) {
    const key = getKey(value);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class MultiMap<K, V> {

  private mapping = new Map<K, V[]>();

  public add(key: K, value: V): void {
    const values = this.mapping.get(key);
    if (values !== undefined) {
      values.push(value);
    } else {
      this.mapping.set(key, [ value ]);
    }
  }

  public *get(key: K): IterableIterator<V> {
    const values = this.mapping.get(key);
    if (values !== undefined) {
      yield* values;
    }
  }

}

export function assert(test: boolean): asserts test {
  if (!test) {
    throw new Error(`Assertion error: an internal invariant failed. This most likely means a bug in typed-sitter.`)
  }
}
