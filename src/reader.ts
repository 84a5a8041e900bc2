
import * as path from "path"
import fs from "fs-extra"

import { SchemaReadError } from "./errors";
import type { GrammarDocument } from "./grammar";
import type { NodeTypesDocument } from "./node-types";
import { parseGrammar, parseNodeTypes } from "./schema";

export const DEFAULT_INPUT_DIRECTORY = 'src';
export const GRAMMAR_FILE_NAME = 'grammar.json';
export const NODE_TYPES_FILE_NAME = 'node-types.json';

export function getGrammarFilePath(inputDirectory = DEFAULT_INPUT_DIRECTORY): string {
  return path.join(inputDirectory, GRAMMAR_FILE_NAME);
}

export function getNodeTypesFilePath(inputDirectory = DEFAULT_INPUT_DIRECTORY): string {
  return path.join(inputDirectory, NODE_TYPES_FILE_NAME);
}

function readJson(document: string, filePath: string): unknown {
  if (!fs.pathExistsSync(filePath)) {
    throw new SchemaReadError(document, [ 'file does not exist; check that the file and its directory exist' ], filePath);
  }
  try {
    return fs.readJsonSync(filePath, { encoding: 'utf8' });
  } catch (e) {
    if (e instanceof SyntaxError) {
      throw new SchemaReadError(document, [ e.message ], filePath);
    }
    throw e;
  }
}

export function readGrammarFile(filePath: string): GrammarDocument {
  return parseGrammar(readJson(GRAMMAR_FILE_NAME, filePath), filePath);
}

export function readNodeTypesFile(filePath: string): NodeTypesDocument {
  return parseNodeTypes(readJson(NODE_TYPES_FILE_NAME, filePath), filePath);
}
