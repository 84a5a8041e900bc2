
import { type Identifier, isIdentifier } from "./identifier";
import type { NodeType } from "./node-types";

/**
 * How many nodes an accessor returns.
 *
 * - `single`: exactly one node
 * - `optional`: one node or nothing
 * - `repeated`: zero or more nodes; an empty list and an absent field are
 *   the same thing
 */
export type Cardinality = 'single' | 'optional' | 'repeated';

export interface NodeTarget {
  readonly kind: 'node';
  readonly name: Identifier;
}

/**
 * A union that has no node type of its own but was made up for a field that
 * accepts more than one node type.
 */
export interface SynthesizedUnion {
  readonly kind: 'synthesized-union';
  readonly name: Identifier;
  readonly variants: readonly Identifier[];
}

export type ResolvedFieldTarget
  = NodeTarget
  | SynthesizedUnion

export interface ResolvedField {
  readonly name: Identifier;
  /**
   * Set on the pseudo-field that holds the children of a node that are not
   * assigned to any field.
   */
  readonly positional: boolean;
  readonly cardinality: Cardinality;
  readonly target: ResolvedFieldTarget;
}

export interface ValueLeaf {
  readonly kind: 'leaf';
  readonly name: Identifier;
  readonly nodeType: NodeType;
}

export interface CompoundNode {
  readonly kind: 'compound';
  readonly name: Identifier;
  readonly nodeType: NodeType;
  readonly fields: readonly ResolvedField[];
}

export interface UnionNode {
  readonly kind: 'union';
  readonly name: Identifier;
  readonly nodeType: NodeType;
  readonly variants: readonly Identifier[];
}

export type ResolvedNodeShape
  = ValueLeaf
  | CompoundNode
  | UnionNode

/**
 * The fully resolved shape of every node type of a grammar.
 *
 * Nodes refer to each other by name only, which is what allows recursive
 * grammars to be represented at all.
 */
export interface BindingPlan {
  readonly grammarName: Identifier;
  /**
   * The node type at the root of every syntax tree, if it is known.
   */
  readonly root: Identifier | null;
  readonly nodes: ReadonlyMap<Identifier, ResolvedNodeShape>;
  readonly unions: ReadonlyMap<Identifier, SynthesizedUnion>;
  readonly fieldNames: readonly Identifier[];
}

/**
 * Find the shape of a node or synthesized union, or nothing if the plan
 * does not contain anything with that name.
 */
export function lookupShape(plan: BindingPlan, name: string): ResolvedNodeShape | SynthesizedUnion | null {
  if (!isIdentifier(name)) {
    return null;
  }
  return plan.nodes.get(name) ?? plan.unions.get(name) ?? null;
}
