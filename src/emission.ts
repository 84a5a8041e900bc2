
import type { Identifier } from "./identifier";
import { type NodeType, nodeTypeKey } from "./node-types";
import type { BindingPlan, Cardinality, ResolvedFieldTarget, ResolvedNodeShape } from "./plan";
import { assert, compareStrings, depthFirstSearch, uniqueBy } from "./util";

export type TargetKind = 'leaf' | 'compound' | 'union';

export interface FieldSpec {
  readonly name: Identifier;
  readonly positional: boolean;
  readonly cardinality: Cardinality;
  readonly target: Identifier;
  readonly targetKind: TargetKind;
  /**
   * The node types a node must have to be accepted by this field, with
   * every union expanded.
   */
  readonly concreteTypes: readonly NodeType[];
}

export interface UnionUnit {
  readonly kind: 'union';
  readonly name: Identifier;
  /**
   * Set when the union has no node type of its own because it was made up
   * for a field that accepts more than one node type.
   */
  readonly synthesized: boolean;
  readonly nodeType: NodeType | null;
  readonly variants: readonly Identifier[];
  /**
   * The variants with every nested union replaced by its own variants.
   */
  readonly concreteVariants: readonly Identifier[];
}

export interface CompoundUnit {
  readonly kind: 'compound';
  readonly name: Identifier;
  readonly nodeType: NodeType;
  readonly fields: readonly FieldSpec[];
}

export interface LeafUnit {
  readonly kind: 'leaf';
  readonly name: Identifier;
  readonly nodeType: NodeType;
}

export type EmissionUnit
  = UnionUnit
  | CompoundUnit
  | LeafUnit

/**
 * Everything a backend needs to know to render bindings, in the order in
 * which it should be rendered.
 */
export interface EmissionRequest {
  readonly grammarName: Identifier;
  readonly root: Identifier | null;
  readonly units: readonly EmissionUnit[];
  readonly fieldNames: readonly Identifier[];
}

const unitOrder = {
  union: 0,
  compound: 1,
  leaf: 2,
};

function compareUnits(a: EmissionUnit, b: EmissionUnit): number {
  return unitOrder[a.kind] - unitOrder[b.kind] || compareStrings(a.name, b.name);
}

/**
 * Flattens a binding plan into a list of emission units.
 *
 * Unions come first, followed by compound nodes and finally leaves. Within
 * each group, units are sorted by name.
 */
export function buildEmissionRequest(plan: BindingPlan): EmissionRequest {

  const getVariants = (name: Identifier): readonly Identifier[] => {
    const shape = plan.nodes.get(name);
    if (shape !== undefined) {
      return shape.kind === 'union' ? shape.variants : [];
    }
    return plan.unions.get(name)?.variants ?? [];
  }

  const isUnion = (name: Identifier): boolean =>
    plan.unions.has(name) || plan.nodes.get(name)?.kind === 'union';

  const getConcreteVariants = (name: Identifier): Identifier[] => {
    const result = [];
    for (const variant of depthFirstSearch(name, getVariants, false)) {
      if (!isUnion(variant)) {
        result.push(variant);
      }
    }
    return result;
  }

  const getNodeType = (name: Identifier): NodeType => {
    const shape = plan.nodes.get(name);
    assert(shape !== undefined);
    return shape.nodeType;
  }

  const getTargetKind = (target: ResolvedFieldTarget): TargetKind => {
    if (target.kind === 'synthesized-union') {
      return 'union';
    }
    const shape = plan.nodes.get(target.name);
    assert(shape !== undefined);
    return shape.kind;
  }

  const getConcreteTypes = (target: ResolvedFieldTarget): NodeType[] => {
    const names = isUnion(target.name) ? getConcreteVariants(target.name) : [ target.name ];
    return uniqueBy(names.map(getNodeType), nodeTypeKey)
      .map(({ type, named }) => ({ type, named }));
  }

  const buildUnit = (shape: ResolvedNodeShape): EmissionUnit => {
    switch (shape.kind) {
      case 'union':
        return {
          kind: 'union',
          name: shape.name,
          synthesized: false,
          nodeType: shape.nodeType,
          variants: shape.variants,
          concreteVariants: getConcreteVariants(shape.name),
        };
      case 'compound':
        return {
          kind: 'compound',
          name: shape.name,
          nodeType: shape.nodeType,
          fields: shape.fields.map(field => ({
            name: field.name,
            positional: field.positional,
            cardinality: field.cardinality,
            target: field.target.name,
            targetKind: getTargetKind(field.target),
            concreteTypes: getConcreteTypes(field.target),
          })),
        };
      case 'leaf':
        return {
          kind: 'leaf',
          name: shape.name,
          nodeType: shape.nodeType,
        };
    }
  }

  const units: EmissionUnit[] = [];
  for (const shape of plan.nodes.values()) {
    units.push(buildUnit(shape));
  }
  for (const union of plan.unions.values()) {
    units.push({
      kind: 'union',
      name: union.name,
      synthesized: true,
      nodeType: null,
      variants: union.variants,
      concreteVariants: getConcreteVariants(union.name),
    });
  }
  units.sort(compareUnits);

  return {
    grammarName: plan.grammarName,
    root: plan.root,
    units,
    fieldNames: [...plan.fieldNames].sort(compareStrings),
  };
}
