
import type { Problem } from "./problems";
import { formatProblem } from "./problems";

export class MalformedIdentifierError extends Error {

  constructor(public readonly text: string) {
    super(`'${text}' is not a valid identifier: identifiers must start with a letter or an underscore, followed by letters, digits or underscores.`);
    this.name = 'MalformedIdentifierError';
  }

}

/**
 * Thrown when a `grammar.json` or `node-types.json` document does not have
 * the expected structure.
 */
export class SchemaReadError extends Error {

  constructor(
    public readonly document: string,
    public readonly issues: string[],
    public readonly filePath: string | null = null,
  ) {
    super(`Could not read ${document}${filePath !== null ? ` from ${filePath}` : ''}:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'SchemaReadError';
  }

}

/**
 * Thrown when the grammar and the node types disagree in one or more ways.
 *
 * The error always carries every problem that was found, not just the first
 * one.
 */
export class UnificationError extends Error {

  constructor(public readonly problems: readonly Problem[]) {
    super(`Found ${problems.length} structural ${problems.length === 1 ? 'problem' : 'problems'} in the schemas:\n${problems.map((problem, i) => `  ${i+1}. ${formatProblem(problem)}`).join('\n')}`);
    this.name = 'UnificationError';
  }

}

export class RenderError extends Error {

  constructor(public readonly language: string, message: string) {
    super(`Could not render ${language} bindings: ${message}`);
    this.name = 'RenderError';
  }

}

export class UnknownBackendError extends Error {

  constructor(public readonly language: string, public readonly available: readonly string[]) {
    super(`No emission backend for '${language}'. Available backends: ${available.join(', ')}.`);
    this.name = 'UnknownBackendError';
  }

}
