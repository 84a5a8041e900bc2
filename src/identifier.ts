
import { MalformedIdentifierError } from "./errors";
import punctuation from "./punctuation.json";

declare const identifierBrand: unique symbol;

/**
 * A name that may be used as the key of a rule, a node type or a field.
 *
 * Plain strings are turned into identifiers with {@link toIdentifier} or
 * narrowed with {@link isIdentifier}.
 */
export type Identifier = string & { readonly [identifierBrand]: true };

export const IDENTIFIER_PATTERN = /^[A-Za-z_]\w*$/;

export function isIdentifier(text: string): text is Identifier {
  return IDENTIFIER_PATTERN.test(text);
}

export function toIdentifier(text: string): Identifier {
  if (!isIdentifier(text)) {
    throw new MalformedIdentifierError(text);
  }
  return text;
}

const punctuationNames = new Map<string, string>(Object.entries(punctuation));

function describeCharacter(ch: string): string {
  return punctuationNames.get(ch) ?? `u${(ch.codePointAt(0) ?? 0).toString(16)}`;
}

/**
 * Spell out arbitrary token text using only word characters, e.g. `+=`
 * becomes `plus_eq` and `a-b` becomes `a_dash_b`.
 */
export function spellOut(text: string): string {
  const chunks = [];
  let word = '';
  for (const ch of text) {
    if (/\w/.test(ch)) {
      word += ch;
      continue;
    }
    if (word !== '') {
      chunks.push(word);
      word = '';
    }
    chunks.push(describeCharacter(ch));
  }
  if (word !== '') {
    chunks.push(word);
  }
  return chunks.join('_');
}

/**
 * Derive the identifier that generated code uses for a node type.
 *
 * Named node types keep their name. Anonymous node types are usually
 * punctuation or keywords, so they get an `anon_` prefix to keep them apart
 * from a named node type with the same text.
 */
export function getBindingName(type: string, named: boolean): Identifier {
  if (named) {
    if (isIdentifier(type)) {
      return type;
    }
    const spelled = spellOut(type);
    return toIdentifier(/^[A-Za-z_]/.test(spelled) ? spelled : `_${spelled}`);
  }
  return toIdentifier(`anon_${spellOut(type)}`);
}

function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .split('_')
    .filter(word => word.length > 0);
}

export function toPascalCase(name: string): string {
  return splitWords(name)
    .map(word => word[0].toUpperCase() + word.substring(1))
    .join('');
}

export function toCamelCase(name: string): string {
  const pascal = toPascalCase(name);
  return pascal.length === 0 ? pascal : pascal[0].toLowerCase() + pascal.substring(1);
}

export function toUpperSnakeCase(name: string): string {
  const prefix = /^_*/.exec(name)?.[0] ?? '';
  return prefix + splitWords(name).map(word => word.toUpperCase()).join('_');
}
