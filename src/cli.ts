#!/usr/bin/env node

import * as path from "path"
import fs from "fs-extra"

import "source-map-support/register"
import minimist from "minimist"

import { type Artifact, getBackend } from "./backends"
import { buildEmissionRequest } from "./emission"
import { RenderError, SchemaReadError, UnificationError, UnknownBackendError } from "./errors"
import type { GrammarDocument } from "./grammar"
import type { NodeTypesDocument } from "./node-types"
import { formatProblem } from "./problems"
import { getGrammarFilePath, getNodeTypesFilePath, readGrammarFile, readNodeTypesFile } from "./reader"
import { GrammarRegistry } from "./resolver"
import { checkSchemas, unify } from "./unifier"
import { error, fatal, info, setVerbose, warn } from "./util"

export const DEFAULT_LANGUAGE = 'typescript';

const USAGE = `Usage: typed-sitter <command> [options]

Commands:
  wrapper      Generate typed wrappers for the nodes of a syntax tree
  constants    Generate constants for the names of node types and fields
  check        Report every inconsistency between grammar.json and node-types.json
  plan         Print the resolved bindings as JSON

Options:
  -l, --for-language <name>      Language to generate code for (default: ${DEFAULT_LANGUAGE})
  -i, --input-directory <dir>    Directory with grammar.json and node-types.json (default: src)
  -o, --output-directory <dir>   Where to write generated files (default: bindings/<language>)
      --grammar <file>           Read the grammar from this file instead
      --node-types <file>        Read the node types from this file instead
      --inherits <file>          Grammar the grammar inherits from (may be repeated)
      --stdout                   Print generated code instead of writing it to a file
  -q, --quiet                    Only report warnings and errors
`;

function getStrings(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [ value ];
  return values.filter((element): element is string => typeof(element) === 'string' && element !== '');
}

function getString(value: unknown): string | null {
  const values = getStrings(value);
  return values.length === 0 ? null : values[values.length-1];
}

interface Inputs {
  grammar: GrammarDocument;
  nodeTypes: NodeTypesDocument;
  grammars: GrammarRegistry;
}

function getOutputFileName(artifact: Artifact, fileExtension: string): string {
  return `${artifact === 'wrapper' ? 'wrapper' : 'nodes'}.${fileExtension}`;
}

/**
 * Run the command-line interface with the given arguments, not including
 * the name of the program.
 *
 * @returns The exit code of the program.
 */
export function run(argv: string[]): number {

  const args = minimist(argv, {
    string: [ 'for-language', 'input-directory', 'output-directory', 'grammar', 'node-types', 'inherits' ],
    boolean: [ 'stdout', 'quiet', 'help' ],
    alias: {
      l: 'for-language',
      i: 'input-directory',
      o: 'output-directory',
      q: 'quiet',
      h: 'help',
    },
  });

  setVerbose(!args.quiet);

  if (args.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  if (args._.length === 0) {
    error(`No command given.`);
    process.stderr.write(USAGE);
    return 1;
  }

  const [ command, ...rest ] = args._;

  if (rest.length > 0) {
    error(`Unexpected arguments: ${rest.join(' ')}`);
    return 1;
  }

  const language = getString(args['for-language']) ?? DEFAULT_LANGUAGE;
  const inputDirectory = getString(args['input-directory']) ?? undefined;
  const outputDirectory = getString(args['output-directory']) ?? path.join('bindings', language);

  const readInputs = (): Inputs => {
    const grammarPath = getString(args['grammar']) ?? getGrammarFilePath(inputDirectory);
    const nodeTypesPath = getString(args['node-types']) ?? getNodeTypesFilePath(inputDirectory);
    info(`Reading grammar from ${grammarPath} ...`);
    const grammar = readGrammarFile(grammarPath);
    info(`Reading node types from ${nodeTypesPath} ...`);
    const nodeTypes = readNodeTypesFile(nodeTypesPath);
    const grammars = new GrammarRegistry();
    for (const filePath of getStrings(args['inherits'])) {
      info(`Reading inherited grammar from ${filePath} ...`);
      grammars.add(readGrammarFile(filePath));
    }
    const parentName = grammar.inherits;
    if (parentName !== null && !grammars.has(parentName)) {
      warn(`Grammar '${grammar.name}' inherits from '${parentName}'. Use --inherits to provide the grammar.json of '${parentName}'.`);
    }
    return { grammar, nodeTypes, grammars };
  }

  const generateArtifact = (artifact: Artifact): number => {
    const backend = getBackend(language);
    const { grammar, nodeTypes, grammars } = readInputs();
    const code = backend.render(buildEmissionRequest(unify(grammar, nodeTypes, { grammars })), artifact);
    if (args.stdout) {
      process.stdout.write(code);
      return 0;
    }
    const outputFile = path.join(outputDirectory, getOutputFileName(artifact, backend.fileExtension));
    info(`Writing ${language} ${artifact} for grammar '${grammar.name}' to ${path.resolve(outputFile)} ...`);
    fs.outputFileSync(outputFile, code, 'utf8');
    return 0;
  }

  try {
    switch (command) {
      case 'wrapper':
      case 'constants':
        return generateArtifact(command);
      case 'check':
      {
        const { grammar, nodeTypes, grammars } = readInputs();
        const problems = checkSchemas(grammar, nodeTypes, { grammars });
        if (problems.length === 0) {
          info(`No problems found in grammar '${grammar.name}'.`);
          return 0;
        }
        for (const problem of problems) {
          error(formatProblem(problem));
        }
        error(`Found ${problems.length} ${problems.length === 1 ? 'problem' : 'problems'}.`);
        return 1;
      }
      case 'plan':
      {
        const { grammar, nodeTypes, grammars } = readInputs();
        const request = buildEmissionRequest(unify(grammar, nodeTypes, { grammars }));
        process.stdout.write(JSON.stringify(request, null, 2) + '\n');
        return 0;
      }
      default:
        error(`Unknown command '${command}'. Available commands: wrapper, constants, check, plan.`);
        return 1;
    }
  } catch (e) {
    if (e instanceof SchemaReadError
        || e instanceof UnificationError
        || e instanceof RenderError
        || e instanceof UnknownBackendError) {
      error(e.message);
      return 1;
    }
    throw e;
  }

}

if (require.main === module) {
  try {
    process.exitCode = run(process.argv.slice(2));
  } catch (e) {
    fatal(e instanceof Error ? e.stack ?? e.message : String(e));
  }
}
