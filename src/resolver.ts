
import type { GrammarDocument } from "./grammar";
import type { Identifier } from "./identifier";
import { ProblemCollector } from "./problems";
import type { Rule } from "./rules";

/**
 * Holds the grammars that other grammars may inherit from, keyed by name.
 */
export class GrammarRegistry {

  private grammars = new Map<string, GrammarDocument>();

  constructor(grammars: Iterable<GrammarDocument> = []) {
    for (const grammar of grammars) {
      this.add(grammar);
    }
  }

  public add(grammar: GrammarDocument): void {
    this.grammars.set(grammar.name, grammar);
  }

  public get(name: string): GrammarDocument | null {
    return this.grammars.get(name) ?? null;
  }

  public has(name: string): boolean {
    return this.grammars.has(name);
  }

}

export interface ResolvedRule {
  name: Identifier;
  rule: Rule;
  /**
   * The grammar in the inheritance chain that defined the rule.
   */
  grammar: GrammarDocument;
}

/**
 * Looks up rules in a grammar and, failing that, in the grammars it inherits
 * from.
 *
 * The documents themselves are never merged or modified. Instead, the
 * resolver keeps the chain of grammars and asks each of them in turn, so a
 * rule in a child grammar shadows a rule with the same name in its parent.
 */
export class RuleResolver {

  /**
   * The inheritance chain, starting with the grammar itself and ending with
   * the grammar that does not inherit from anything.
   */
  public readonly layers: readonly GrammarDocument[];

  constructor(
    public readonly grammar: GrammarDocument,
    registry: GrammarRegistry = new GrammarRegistry(),
    problems: ProblemCollector = new ProblemCollector(),
  ) {
    const layers = [ grammar ];
    const visited = new Set<string>([ grammar.name ]);
    let currGrammar = grammar;
    while (currGrammar.inherits !== null) {
      const parentName = currGrammar.inherits;
      const location = `grammar '${currGrammar.name}'`;
      const parent = parentName === currGrammar.name ? currGrammar : registry.get(parentName);
      if (parent === null) {
        problems.add('unresolved-grammar', parentName, location, `inherits from '${parentName}', but no grammar with that name was provided`);
        break;
      }
      if (visited.has(parent.name)) {
        problems.add('inheritance-cycle', parentName, location, `inherits from '${parentName}', which leads back to '${currGrammar.name}'`);
        break;
      }
      visited.add(parent.name);
      layers.push(parent);
      currGrammar = parent;
    }
    this.layers = layers;
  }

  /**
   * Find the rule with the given name, searching the grammar first and then
   * each grammar it inherits from.
   */
  public resolve(name: string): ResolvedRule | null {
    for (const layer of this.layers) {
      const entry = layer.getRuleEntry(name);
      if (entry !== null) {
        return { name: entry.name, rule: entry.rule, grammar: layer };
      }
    }
    return null;
  }

  public isExternal(name: string): boolean {
    return this.layers.some(layer => layer.isExternal(name));
  }

  public isSuperType(name: string): boolean {
    return this.layers.some(layer => layer.isSuperType(name));
  }

  /**
   * Check whether a reference to `name` would resolve to something, either a
   * rule or a token produced by an external scanner.
   */
  public canResolveSymbol(name: string): boolean {
    return this.resolve(name) !== null || this.isExternal(name);
  }

  /**
   * Get every rule that is visible from the grammar, i.e. every rule of the
   * inheritance chain that is not shadowed by a rule further down the chain.
   *
   * Rules of the grammar itself come first, in declaration order, followed
   * by the remaining rules of its parent, and so on.
   */
  public getEffectiveRules(): ResolvedRule[] {
    const result = [];
    const seen = new Set<string>();
    for (const layer of this.layers) {
      for (const [name, rule] of layer.getRules()) {
        if (!seen.has(name)) {
          seen.add(name);
          result.push({ name, rule, grammar: layer });
        }
      }
    }
    return result;
  }

  /**
   * The first rule of the nearest grammar in the chain that defines any
   * rules.
   */
  public getRootRuleName(): Identifier | null {
    for (const layer of this.layers) {
      const rootName = layer.getRootRuleName();
      if (rootName !== null) {
        return rootName;
      }
    }
    return null;
  }

}
