
import type { Identifier } from "./identifier";

/**
 * A single production of a grammar, as found in the `rules` of a
 * `grammar.json` file.
 *
 * The `type` tags are the ones tree-sitter writes, so a rule can be read
 * from and written to JSON without any conversion.
 */
export type Rule
  = SequenceRule
  | ChoiceRule
  | FieldRule
  | TokenRule
  | ImmediateTokenRule
  | RepeatRule
  | Repeat1Rule
  | ReservedRule
  | PrecedenceRule
  | StringRule
  | PatternRule
  | SymbolRule
  | AliasRule
  | BlankRule

export type RuleType = Rule['type'];

export interface SequenceRule {
  readonly type: 'SEQ';
  readonly members: readonly Rule[];
}

export interface ChoiceRule {
  readonly type: 'CHOICE';
  readonly members: readonly Rule[];
}

export interface FieldRule {
  readonly type: 'FIELD';
  readonly name: Identifier;
  readonly content: Rule;
}

export interface TokenRule {
  readonly type: 'TOKEN';
  readonly content: Rule;
}

export interface ImmediateTokenRule {
  readonly type: 'IMMEDIATE_TOKEN';
  readonly content: Rule;
}

/**
 * Matches its content zero or more times.
 */
export interface RepeatRule {
  readonly type: 'REPEAT';
  readonly content: Rule;
}

/**
 * Matches its content one or more times.
 */
export interface Repeat1Rule {
  readonly type: 'REPEAT1';
  readonly content: Rule;
}

export interface ReservedRule {
  readonly type: 'RESERVED';
  readonly context_name: Identifier;
  readonly content: Rule;
}

/**
 * Precedence values are either numeric or refer to a named precedence
 * level.
 */
export type PrecedenceValue = number | string;

export interface PrecedenceRule {
  readonly type: 'PREC' | 'PREC_LEFT' | 'PREC_RIGHT' | 'PREC_DYNAMIC';
  readonly value: PrecedenceValue;
  readonly content: Rule;
}

export interface StringRule {
  readonly type: 'STRING';
  readonly value: string;
}

export interface PatternRule {
  readonly type: 'PATTERN';
  readonly value: string;
  readonly flags?: string;
}

export interface SymbolRule {
  readonly type: 'SYMBOL';
  readonly name: Identifier;
}

export interface AliasRule {
  readonly type: 'ALIAS';
  readonly value: string;
  readonly named: boolean;
  readonly content: Rule;
}

export interface BlankRule {
  readonly type: 'BLANK';
}

export function seq(...members: Rule[]): SequenceRule {
  return { type: 'SEQ', members };
}

export function choice(...members: Rule[]): ChoiceRule {
  return { type: 'CHOICE', members };
}

/**
 * Grammars have no separate optional rule; `optional(x)` is written as a
 * choice between `x` and nothing.
 */
export function optional(content: Rule): ChoiceRule {
  return choice(content, blank());
}

export function field(name: Identifier, content: Rule): FieldRule {
  return { type: 'FIELD', name, content };
}

export function token(content: Rule): TokenRule {
  return { type: 'TOKEN', content };
}

export function immediateToken(content: Rule): ImmediateTokenRule {
  return { type: 'IMMEDIATE_TOKEN', content };
}

export function repeat(content: Rule): RepeatRule {
  return { type: 'REPEAT', content };
}

export function repeat1(content: Rule): Repeat1Rule {
  return { type: 'REPEAT1', content };
}

export function reserved(contextName: Identifier, content: Rule): ReservedRule {
  return { type: 'RESERVED', context_name: contextName, content };
}

export function prec(value: PrecedenceValue, content: Rule): PrecedenceRule {
  return { type: 'PREC', value, content };
}

export function precLeft(value: PrecedenceValue, content: Rule): PrecedenceRule {
  return { type: 'PREC_LEFT', value, content };
}

export function precRight(value: PrecedenceValue, content: Rule): PrecedenceRule {
  return { type: 'PREC_RIGHT', value, content };
}

export function precDynamic(value: PrecedenceValue, content: Rule): PrecedenceRule {
  return { type: 'PREC_DYNAMIC', value, content };
}

export function str(value: string): StringRule {
  return { type: 'STRING', value };
}

export function pattern(value: string, flags?: string): PatternRule {
  return flags === undefined ? { type: 'PATTERN', value } : { type: 'PATTERN', value, flags };
}

export function sym(name: Identifier): SymbolRule {
  return { type: 'SYMBOL', name };
}

export function alias(content: Rule, value: string, named: boolean): AliasRule {
  return { type: 'ALIAS', value, named, content };
}

export function blank(): BlankRule {
  return { type: 'BLANK' };
}

/**
 * Get the rules that are directly nested inside the given rule, in the order
 * in which they were declared.
 */
export function getChildRules(rule: Rule): readonly Rule[] {
  switch (rule.type) {
    case 'SEQ':
    case 'CHOICE':
      return rule.members;
    case 'FIELD':
    case 'TOKEN':
    case 'IMMEDIATE_TOKEN':
    case 'REPEAT':
    case 'REPEAT1':
    case 'RESERVED':
    case 'PREC':
    case 'PREC_LEFT':
    case 'PREC_RIGHT':
    case 'PREC_DYNAMIC':
    case 'ALIAS':
      return [ rule.content ];
    case 'STRING':
    case 'PATTERN':
    case 'SYMBOL':
    case 'BLANK':
      return [];
  }
}

/**
 * Visit the rule and everything nested inside it, depth-first and in
 * declaration order.
 *
 * Symbol references are not followed, so this always terminates, even on
 * recursive grammars.
 */
export function *walkRule(rule: Rule): IterableIterator<Rule> {
  yield rule;
  for (const child of getChildRules(rule)) {
    yield* walkRule(child);
  }
}

export function *getSymbolReferences(rule: Rule): IterableIterator<SymbolRule> {
  for (const nested of walkRule(rule)) {
    if (nested.type === 'SYMBOL') {
      yield nested;
    }
  }
}

export function *getFieldNames(rule: Rule): IterableIterator<Identifier> {
  for (const nested of walkRule(rule)) {
    if (nested.type === 'FIELD') {
      yield nested.name;
    }
  }
}

/**
 * Check whether a field is declared somewhere in the rule itself.
 *
 * Fields declared in rules that are only referenced by name are not taken
 * into account.
 */
export function hasFields(rule: Rule): boolean {
  return !getFieldNames(rule).next().done;
}

function unwrapPrecedence(rule: Rule): Rule {
  while (rule.type === 'PREC'
      || rule.type === 'PREC_LEFT'
      || rule.type === 'PREC_RIGHT'
      || rule.type === 'PREC_DYNAMIC'
      || rule.type === 'RESERVED') {
    rule = rule.content;
  }
  return rule;
}

/**
 * Check whether the rule is matched by the lexer as a whole, in which case
 * the node it produces cannot have any children.
 */
export function isTokenRule(rule: Rule): boolean {
  const inner = unwrapPrecedence(rule);
  return inner.type === 'TOKEN'
      || inner.type === 'IMMEDIATE_TOKEN'
      || inner.type === 'STRING'
      || inner.type === 'PATTERN';
}
