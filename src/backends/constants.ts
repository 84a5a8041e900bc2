
import type { EmissionRequest } from "../emission";
import { toUpperSnakeCase } from "../identifier";

const unitPrefixes = {
  union: 'SUPERTYPE_',
  compound: 'NODE_',
  leaf: 'TERMINAL_',
};

/**
 * Get a constant for every node type and every field name, in the order of
 * the request.
 *
 * Node types come first. Their constants are prefixed with `SUPERTYPE_`,
 * `NODE_` or `TERMINAL_` depending on their kind, while field names get the
 * prefix `FIELD_`. Names only differing in case, such as the keywords
 * `select` and `SELECT`, would map to the same constant, so every constant
 * after the first gets a suffix `_2`, `_3`, and so on.
 */
export function getConstants(request: EmissionRequest): Array<[string, string]> {
  const constants = new Map<string, string>();
  const define = (baseName: string, value: string) => {
    let name = baseName;
    for (let i = 2; constants.has(name); i++) {
      name = `${baseName}_${i}`;
    }
    constants.set(name, value);
  }
  for (const unit of request.units) {
    if (unit.nodeType === null) {
      continue;
    }
    define(unitPrefixes[unit.kind] + toUpperSnakeCase(unit.name), unit.nodeType.type);
  }
  for (const fieldName of request.fieldNames) {
    define('FIELD_' + toUpperSnakeCase(fieldName), fieldName);
  }
  return [...constants];
}
