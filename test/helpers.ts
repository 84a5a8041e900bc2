
import * as path from "path"

import type { GrammarDocument } from "../src/grammar";
import { type Identifier, toIdentifier } from "../src/identifier";
import { createNodeChildren, createNodeType, type NodeChildren } from "../src/node-types";
import { readGrammarFile, readNodeTypesFile } from "../src/reader";
import type { NodeTypesDocument } from "../src/node-types";

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export function id(text: string): Identifier {
  return toIdentifier(text);
}

export function getFixturePath(...segments: string[]): string {
  return path.join(FIXTURES_DIR, ...segments);
}

export function loadFixture(name: string): [GrammarDocument, NodeTypesDocument] {
  return [
    readGrammarFile(getFixturePath(name, 'grammar.json')),
    readNodeTypesFile(getFixturePath(name, 'node-types.json')),
  ];
}

/**
 * Shorthand for the children of a field that accepts the given named node
 * types.
 */
export function children(multiple: boolean, required: boolean, ...types: string[]): NodeChildren {
  return createNodeChildren(multiple, required, types.map(type => createNodeType(type)));
}
