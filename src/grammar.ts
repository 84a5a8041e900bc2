
import type { Identifier } from "./identifier";
import type { Rule } from "./rules";

export interface RuleEntry {
  readonly name: Identifier;
  readonly rule: Rule;
}

export interface GrammarDocumentOptions {
  name: Identifier;
  rules: Iterable<[Identifier, Rule]>;
  inherits?: Identifier | null;
  conflicts?: readonly (readonly Identifier[])[];
  precedences?: readonly (readonly Rule[])[];
  externals?: readonly Rule[];
  extras?: readonly Rule[];
  inline?: readonly Identifier[];
  reserved?: Iterable<[Identifier, readonly Rule[]]>;
  supertypes?: readonly Identifier[];
  word?: Identifier | null;
}

/**
 * An in-memory representation of a `grammar.json` file.
 *
 * The rule table keeps the order in which rules were declared because the
 * first rule is the root of every syntax tree the grammar produces.
 *
 * If the grammar inherits from another grammar, only the name of the parent
 * is stored here. Looking up rules through the parent is done by
 * {@link RuleResolver}.
 */
export class GrammarDocument {

  public readonly name: Identifier;
  public readonly inherits: Identifier | null;
  public readonly conflicts: readonly (readonly Identifier[])[];
  public readonly precedences: readonly (readonly Rule[])[];
  public readonly externals: readonly Rule[];
  public readonly extras: readonly Rule[];
  public readonly inline: readonly Identifier[];
  public readonly supertypes: readonly Identifier[];
  public readonly word: Identifier | null;

  private readonly ruleNames: readonly Identifier[];
  private readonly rules = new Map<string, RuleEntry>();
  private readonly reserved: ReadonlyMap<Identifier, readonly Rule[]>;

  constructor({
    name,
    rules,
    inherits = null,
    conflicts = [],
    precedences = [],
    externals = [],
    extras = [],
    inline = [],
    reserved = [],
    supertypes = [],
    word = null,
  }: GrammarDocumentOptions) {
    this.name = name;
    const ruleNames = [];
    for (const [ruleName, rule] of rules) {
      if (!this.rules.has(ruleName)) {
        ruleNames.push(ruleName);
      }
      this.rules.set(ruleName, { name: ruleName, rule });
    }
    this.ruleNames = ruleNames;
    this.inherits = inherits;
    this.conflicts = conflicts;
    this.precedences = precedences;
    this.externals = externals;
    this.extras = extras;
    this.inline = inline;
    this.reserved = new Map(reserved);
    this.supertypes = supertypes;
    this.word = word;
    Object.freeze(this);
  }

  public getRule(name: string): Rule | null {
    return this.rules.get(name)?.rule ?? null;
  }

  /**
   * Like {@link getRule}, but also returns the name of the rule as an
   * identifier.
   */
  public getRuleEntry(name: string): RuleEntry | null {
    return this.rules.get(name) ?? null;
  }

  public hasRule(name: string): boolean {
    return this.rules.has(name);
  }

  public *getRules(): IterableIterator<[Identifier, Rule]> {
    for (const name of this.ruleNames) {
      const entry = this.rules.get(name);
      if (entry !== undefined) {
        yield [ name, entry.rule ];
      }
    }
  }

  public getRuleNames(): Identifier[] {
    return [...this.ruleNames];
  }

  public getRuleCount(): number {
    return this.ruleNames.length;
  }

  /**
   * The rule that matches a complete source file, or nothing if the grammar
   * defines no rules of its own.
   */
  public getRootRuleName(): Identifier | null {
    return this.ruleNames.length > 0 ? this.ruleNames[0] : null;
  }

  public getReserved(): IterableIterator<[Identifier, readonly Rule[]]> {
    return this.reserved.entries();
  }

  public getReservedContextNames(): Identifier[] {
    return [...this.reserved.keys()];
  }

  /**
   * Get the names of the tokens that are produced by the external scanner
   * rather than by a rule in this grammar.
   */
  public getExternalSymbolNames(): Identifier[] {
    const result = [];
    for (const external of this.externals) {
      if (external.type === 'SYMBOL') {
        result.push(external.name);
      }
    }
    return result;
  }

  public isExternal(name: string): boolean {
    return this.getExternalSymbolNames().some(externalName => externalName === name);
  }

  public isSuperType(name: string): boolean {
    return this.supertypes.some(superTypeName => superTypeName === name);
  }

}
