
import { UnificationError } from "./errors";
import type { GrammarDocument } from "./grammar";
import { getBindingName, type Identifier, toIdentifier } from "./identifier";
import {
  formatNodeType,
  isSuperTypeDefinition,
  isTerminalDefinition,
  type NodeChildren,
  type NodeType,
  type NodeTypeDefinition,
  nodeTypeKey,
  type NodeTypesDocument,
} from "./node-types";
import type {
  BindingPlan,
  Cardinality,
  ResolvedField,
  ResolvedFieldTarget,
  ResolvedNodeShape,
  SynthesizedUnion,
} from "./plan";
import { type Problem, ProblemCollector } from "./problems";
import { GrammarRegistry, RuleResolver } from "./resolver";
import { getSymbolReferences, hasFields, isTokenRule, type Rule } from "./rules";
import { assert, uniqueBy } from "./util";

export interface UnifyOptions {
  /**
   * Grammars that the grammar may inherit from, directly or indirectly.
   */
  grammars?: GrammarRegistry | Iterable<GrammarDocument>;
}

export function getCardinality(children: NodeChildren): Cardinality {
  if (children.multiple) {
    return 'repeated';
  }
  return children.required ? 'single' : 'optional';
}

function describeDefinition(definition: NodeTypeDefinition): string {
  if (isSuperTypeDefinition(definition)) {
    return 'a supertype';
  }
  return isTerminalDefinition(definition) ? 'a terminal' : 'a node with fields or children';
}

type GrammarClassification
  = 'supertype'
  | 'terminal'
  | 'compound'
  | 'unknown'

/**
 * Checks a grammar against the node types generated for it and, if the two
 * agree, resolves the shape of every node type.
 *
 * All problems are collected before anything is reported, so a single run
 * shows everything that needs fixing.
 */
class SchemaUnifier {

  private readonly problems = new ProblemCollector();
  private readonly resolver: RuleResolver;

  constructor(
    private readonly grammar: GrammarDocument,
    private readonly nodeTypes: NodeTypesDocument,
    registry: GrammarRegistry,
  ) {
    this.resolver = new RuleResolver(grammar, registry, this.problems);
  }

  public check(): readonly Problem[] {
    this.checkSymbolReferences();
    this.checkNodeTypeDefinitions();
    this.checkSuperTypes();
    this.checkClassifications();
    return this.problems.getProblems();
  }

  private checkSymbolsIn(rule: Rule, location: string): void {
    for (const symbol of getSymbolReferences(rule)) {
      this.checkSymbolName(symbol.name, location);
    }
  }

  private checkSymbolName(name: string, location: string): void {
    if (!this.resolver.canResolveSymbol(name)) {
      this.problems.add(
        'unresolved-symbol',
        name,
        location,
        `refers to '${name}', which is not defined in the grammar or in any grammar it inherits from`
      );
    }
  }

  private checkSymbolReferences(): void {

    for (const { name, rule, grammar } of this.resolver.getEffectiveRules()) {
      this.checkSymbolsIn(rule, `grammar '${grammar.name}': rule '${name}'`);
    }

    // Externals are not checked because they declare names rather than
    // refer to them.
    for (const layer of this.resolver.layers) {
      const location = `grammar '${layer.name}'`;
      for (const extra of layer.extras) {
        this.checkSymbolsIn(extra, `${location}: extras`);
      }
      for (const level of layer.precedences) {
        for (const entry of level) {
          this.checkSymbolsIn(entry, `${location}: precedences`);
        }
      }
      for (const [contextName, words] of layer.getReserved()) {
        for (const word of words) {
          this.checkSymbolsIn(word, `${location}: reserved '${contextName}'`);
        }
      }
      for (const conflict of layer.conflicts) {
        for (const name of conflict) {
          this.checkSymbolName(name, `${location}: conflicts`);
        }
      }
      for (const name of layer.inline) {
        this.checkSymbolName(name, `${location}: inline`);
      }
      for (const name of layer.supertypes) {
        this.checkSymbolName(name, `${location}: supertypes`);
      }
      if (layer.word !== null) {
        this.checkSymbolName(layer.word, `${location}: word`);
      }
    }

  }

  private checkNodeTypeReference(nodeType: NodeType, location: string, role: string): void {
    if (!this.nodeTypes.hasDefinition(nodeType)) {
      this.problems.add(
        'unresolved-node-type',
        nodeType.type,
        location,
        `${role} ${formatNodeType(nodeType)} does not have a definition`
      );
    }
  }

  private checkNodeChildren(children: NodeChildren, location: string): void {
    if (children.types.length === 0) {
      this.problems.add(
        'empty-cardinality',
        location,
        location,
        `is declared with multiple=${children.multiple} and required=${children.required} but does not list any node types`
      );
    }
    for (const nodeType of children.types) {
      this.checkNodeTypeReference(nodeType, location, 'node type');
    }
  }

  private checkNodeTypeDefinitions(): void {
    const seen = new Set<string>();
    for (const definition of this.nodeTypes.getDefinitions()) {
      const location = `node-types.json: node type ${formatNodeType(definition.nodeType)}`;
      const key = nodeTypeKey(definition.nodeType);
      if (seen.has(key)) {
        this.problems.add('duplicate-node-type', definition.nodeType.type, location, 'is defined more than once');
        continue;
      }
      seen.add(key);
      switch (definition.kind.kind) {
        case 'supertype':
          for (const subtype of definition.kind.subtypes) {
            this.checkNodeTypeReference(subtype, location, 'subtype');
          }
          break;
        case 'regular':
          if (definition.kind.fields !== null) {
            for (const [fieldName, children] of definition.kind.fields) {
              this.checkNodeChildren(children, `${location}, field '${fieldName}'`);
            }
          }
          if (definition.kind.children !== null) {
            this.checkNodeChildren(definition.kind.children, `${location}, children`);
          }
          break;
      }
    }
  }

  private checkSuperTypes(): void {
    for (const layer of this.resolver.layers) {
      for (const name of layer.supertypes) {
        const location = `grammar '${layer.name}': supertypes`;
        const definition = this.nodeTypes.getDefinition({ type: name, named: true });
        if (definition === null) {
          this.problems.add(
            'unresolved-super-type',
            name,
            location,
            `'${name}' is declared as a supertype, but node-types.json has no definition for it`
          );
        } else if (!isSuperTypeDefinition(definition)) {
          this.problems.add(
            'classification-mismatch',
            name,
            location,
            `'${name}' is declared as a supertype, but node-types.json defines it as ${describeDefinition(definition)}`
          );
        }
      }
    }
  }

  /**
   * Work out what the grammar says about the structure of the node type
   * with the given name.
   */
  private classifyInGrammar(name: string): GrammarClassification {
    if (this.resolver.isSuperType(name)) {
      return 'supertype';
    }
    const resolved = this.resolver.resolve(name);
    if (resolved === null) {
      return this.resolver.isExternal(name) ? 'terminal' : 'unknown';
    }
    if (isTokenRule(resolved.rule)) {
      return 'terminal';
    }
    if (hasFields(resolved.rule)) {
      return 'compound';
    }
    return 'unknown';
  }

  private checkClassifications(): void {
    for (const definition of this.nodeTypes.getDefinitions()) {
      if (!definition.nodeType.named) {
        continue;
      }
      const name = definition.nodeType.type;
      const location = `node-types.json: node type ${name}`;
      const classification = this.classifyInGrammar(name);
      switch (classification) {
        case 'supertype':
          // Reported by checkSuperTypes()
          break;
        case 'terminal':
          if (!isTerminalDefinition(definition)) {
            this.problems.add(
              'classification-mismatch',
              name,
              location,
              `is defined as ${describeDefinition(definition)}, but the grammar produces it as a single token`
            );
          }
          break;
        case 'compound':
          if (!isTerminalDefinition(definition) && !isSuperTypeDefinition(definition)) {
            break;
          }
          this.problems.add(
            'classification-mismatch',
            name,
            location,
            `is defined as ${describeDefinition(definition)}, but its rule in the grammar declares fields`
          );
          break;
        case 'unknown':
          if (isSuperTypeDefinition(definition) && this.resolver.resolve(name) !== null) {
            this.problems.add(
              'classification-mismatch',
              name,
              location,
              `is defined as a supertype, but the grammar does not list it in its supertypes`
            );
          }
          break;
      }
    }
  }

  public buildPlan(): BindingPlan {

    const bindingNames = new Map<string, Identifier>();
    const takenNames = new Set<string>();

    const claimName = (baseName: Identifier): Identifier => {
      let name = baseName;
      for (let i = 2; takenNames.has(name); i++) {
        name = toIdentifier(`${baseName}_${i}`);
      }
      takenNames.add(name);
      return name;
    }

    for (const definition of this.nodeTypes.getDefinitions()) {
      bindingNames.set(
        nodeTypeKey(definition.nodeType),
        claimName(getBindingName(definition.nodeType.type, definition.nodeType.named))
      );
    }

    const getName = (nodeType: NodeType): Identifier => {
      const name = bindingNames.get(nodeTypeKey(nodeType));
      assert(name !== undefined);
      return name;
    }

    // Synthesized unions are keyed by the exact, ordered list of node types
    // they cover.
    const unionsByKey = new Map<string, SynthesizedUnion>();
    const unions = new Map<Identifier, SynthesizedUnion>();

    const resolveTarget = (types: readonly NodeType[]): ResolvedFieldTarget => {
      const variants = uniqueBy(types, nodeTypeKey).map(getName);
      assert(variants.length > 0);
      if (variants.length === 1) {
        return { kind: 'node', name: variants[0] };
      }
      const key = variants.join('|');
      let union = unionsByKey.get(key);
      if (union === undefined) {
        const created: SynthesizedUnion = {
          kind: 'synthesized-union',
          name: claimName(toIdentifier(variants.join('_or_'))),
          variants: Object.freeze(variants),
        };
        union = Object.freeze(created);
        unionsByKey.set(key, union);
        unions.set(union.name, union);
      }
      return union;
    }

    const resolveField = (name: Identifier, children: NodeChildren, positional: boolean): ResolvedField => {
      return Object.freeze({
        name,
        positional,
        cardinality: getCardinality(children),
        target: resolveTarget(children.types),
      });
    }

    const nodes = new Map<Identifier, ResolvedNodeShape>();

    for (const definition of this.nodeTypes.getDefinitions()) {
      const name = getName(definition.nodeType);
      const nodeType = Object.freeze({ ...definition.nodeType });
      let shape: ResolvedNodeShape;
      if (definition.kind.kind === 'supertype') {
        shape = {
          kind: 'union',
          name,
          nodeType,
          variants: Object.freeze(uniqueBy(definition.kind.subtypes, nodeTypeKey).map(getName)),
        };
      } else if (isTerminalDefinition(definition)) {
        shape = { kind: 'leaf', name, nodeType };
      } else {
        const fields = [];
        if (definition.kind.fields !== null) {
          for (const [fieldName, children] of definition.kind.fields) {
            fields.push(resolveField(fieldName, children, false));
          }
        }
        if (definition.kind.children !== null) {
          fields.push(resolveField(toIdentifier('children'), definition.kind.children, true));
        }
        shape = { kind: 'compound', name, nodeType, fields: Object.freeze(fields) };
      }
      nodes.set(name, Object.freeze(shape));
    }

    return Object.freeze({
      grammarName: this.grammar.name,
      root: this.findRoot(getName),
      nodes,
      unions,
      fieldNames: Object.freeze(this.nodeTypes.getFieldNames()),
    });
  }

  private findRoot(getName: (nodeType: NodeType) => Identifier): Identifier | null {
    for (const definition of this.nodeTypes.getDefinitions()) {
      if (definition.root) {
        return getName(definition.nodeType);
      }
    }
    const rootRuleName = this.resolver.getRootRuleName();
    if (rootRuleName !== null) {
      const rootNodeType = { type: rootRuleName, named: true };
      if (this.nodeTypes.hasDefinition(rootNodeType)) {
        return getName(rootNodeType);
      }
    }
    return null;
  }

}

function toRegistry(grammars: GrammarRegistry | Iterable<GrammarDocument> | undefined): GrammarRegistry {
  if (grammars === undefined) {
    return new GrammarRegistry();
  }
  if (grammars instanceof GrammarRegistry) {
    return grammars;
  }
  return new GrammarRegistry(grammars);
}

/**
 * Find every inconsistency between a grammar and its node types without
 * building a binding plan.
 */
export function checkSchemas(grammar: GrammarDocument, nodeTypes: NodeTypesDocument, { grammars }: UnifyOptions = {}): readonly Problem[] {
  return new SchemaUnifier(grammar, nodeTypes, toRegistry(grammars)).check();
}

/**
 * Resolve the shape of every node type described by a grammar and its node
 * types.
 *
 * @throws {UnificationError} listing every problem that was found if the
 * grammar and the node types are not consistent with each other.
 */
export function unify(grammar: GrammarDocument, nodeTypes: NodeTypesDocument, { grammars }: UnifyOptions = {}): BindingPlan {
  const unifier = new SchemaUnifier(grammar, nodeTypes, toRegistry(grammars));
  const problems = unifier.check();
  if (problems.length > 0) {
    throw new UnificationError(problems);
  }
  return unifier.buildPlan();
}
