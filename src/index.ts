
import { type Artifact, getBackend } from "./backends";
import { buildEmissionRequest } from "./emission";
import type { GrammarDocument } from "./grammar";
import type { NodeTypesDocument } from "./node-types";
import { unify, type UnifyOptions } from "./unifier";

export * from "./rules";
export * from "./identifier";
export * from "./grammar";
export * from "./node-types";
export * from "./schema";
export * from "./reader";
export * from "./problems";
export * from "./errors";
export * from "./resolver";
export * from "./plan";
export * from "./unifier";
export * from "./emission";
export * from "./backends";

export interface GenerateOptions extends UnifyOptions {
  language?: string;
  artifact?: Artifact;
}

/**
 * Generate bindings for the syntax trees described by a grammar and its node
 * types.
 *
 * @throws {UnknownBackendError} when there is no backend for `language`.
 * @throws {UnificationError} when the grammar and the node types disagree.
 * @throws {RenderError} when the bindings cannot be expressed in `language`.
 */
export function generate(grammar: GrammarDocument, nodeTypes: NodeTypesDocument, {
  language = 'typescript',
  artifact = 'wrapper',
  grammars,
}: GenerateOptions = {}): string {
  const backend = getBackend(language);
  const plan = unify(grammar, nodeTypes, { grammars });
  return backend.render(buildEmissionRequest(plan), artifact);
}
