import test from "ava";

import { GrammarDocument } from "../src/grammar";
import { ProblemCollector } from "../src/problems";
import { GrammarRegistry, RuleResolver } from "../src/resolver";
import { field, pattern, seq, str, sym } from "../src/rules";
import { id } from "./helpers";

function createBaseGrammar(): GrammarDocument {
  return new GrammarDocument({
    name: id('base'),
    rules: [
      [ id('program'), sym(id('statement')) ],
      [ id('statement'), seq(field(id('value'), sym(id('identifier'))), str(';')) ],
      [ id('identifier'), pattern('[a-z]+') ],
    ],
    externals: [ sym(id('heredoc')) ],
    supertypes: [ id('statement') ],
  });
}

function createDerivedGrammar(): GrammarDocument {
  return new GrammarDocument({
    name: id('derived'),
    inherits: id('base'),
    rules: [
      [ id('identifier'), pattern('[A-Za-z]+') ],
      [ id('keyword'), str('let') ],
    ],
  });
}

test('can look up rules by name', t => {
  const grammar = createBaseGrammar();
  t.deepEqual(grammar.getRule('identifier'), pattern('[a-z]+'));
  t.is(grammar.getRule('missing'), null);
  t.true(grammar.hasRule('statement'));
  t.is(grammar.getRuleCount(), 3);
  t.deepEqual(grammar.getRuleNames(), [ 'program', 'statement', 'identifier' ]);
  t.is(grammar.getRootRuleName(), 'program');
});

test('can tell external symbols and supertypes apart from rules', t => {
  const grammar = createBaseGrammar();
  t.deepEqual(grammar.getExternalSymbolNames(), [ 'heredoc' ]);
  t.true(grammar.isExternal('heredoc'));
  t.false(grammar.isExternal('identifier'));
  t.true(grammar.isSuperType('statement'));
  t.false(grammar.isSuperType('program'));
});

test('keeps the grammar immutable', t => {
  const grammar = createBaseGrammar();
  t.true(Object.isFrozen(grammar));
});

test('can resolve rules through the grammar a grammar inherits from', t => {
  const base = createBaseGrammar();
  const derived = createDerivedGrammar();
  const resolver = new RuleResolver(derived, new GrammarRegistry([ base ]));
  t.deepEqual(resolver.layers.map(layer => layer.name), [ 'derived', 'base' ]);
  const identifier = resolver.resolve('identifier');
  t.is(identifier?.grammar, derived);
  t.deepEqual(identifier?.rule, pattern('[A-Za-z]+'));
  t.is(resolver.resolve('statement')?.grammar, base);
  t.is(resolver.resolve('missing'), null);
  t.true(resolver.canResolveSymbol('heredoc'));
  t.true(resolver.isSuperType('statement'));
  t.is(resolver.getRootRuleName(), 'identifier');
});

test('lists the rules that are visible from a grammar without shadowed ones', t => {
  const resolver = new RuleResolver(createDerivedGrammar(), new GrammarRegistry([ createBaseGrammar() ]));
  t.deepEqual(
    resolver.getEffectiveRules().map(({ name, grammar }) => `${grammar.name}.${name}`),
    [ 'derived.identifier', 'derived.keyword', 'base.program', 'base.statement' ]
  );
});

test('reports a grammar that inherits from a grammar that was not provided', t => {
  const problems = new ProblemCollector();
  const resolver = new RuleResolver(createDerivedGrammar(), new GrammarRegistry(), problems);
  t.deepEqual(resolver.layers.map(layer => layer.name), [ 'derived' ]);
  t.deepEqual(problems.getProblems().map(problem => [ problem.kind, problem.name ]), [
    [ 'unresolved-grammar', 'base' ],
  ]);
});

test('reports a cycle in the inheritance chain', t => {
  const a = new GrammarDocument({ name: id('a'), inherits: id('b'), rules: [] });
  const b = new GrammarDocument({ name: id('b'), inherits: id('a'), rules: [] });
  const problems = new ProblemCollector();
  const resolver = new RuleResolver(a, new GrammarRegistry([ a, b ]), problems);
  t.deepEqual(resolver.layers.map(layer => layer.name), [ 'a', 'b' ]);
  t.deepEqual(problems.getProblems().map(problem => [ problem.kind, problem.location ]), [
    [ 'inheritance-cycle', "grammar 'b'" ],
  ]);
});
