import test from "ava";

import { SchemaReadError } from "../src/errors";
import { createNodeType, isTerminalDefinition } from "../src/node-types";
import { readGrammarFile, readNodeTypesFile } from "../src/reader";
import { field, sym } from "../src/rules";
import { parseGrammar, parseNodeTypes } from "../src/schema";
import { getFixturePath, id, loadFixture } from "./helpers";

test('can read grammar.json and node-types.json', t => {
  const [ grammar, nodeTypes ] = loadFixture('calc');
  t.is(grammar.name, 'calc');
  t.is(grammar.word, 'identifier');
  t.deepEqual([...grammar.supertypes], [ '_expression' ]);
  t.deepEqual(grammar.getRuleNames(), [ 'program', 'assignment', '_expression', 'binary_expression', 'number', 'identifier' ]);
  t.is(nodeTypes.getDefinitionCount(), 9);
  const program = nodeTypes.getDefinition(createNodeType('program'));
  t.is(program?.root, true);
  const plus = nodeTypes.getDefinition(createNodeType('+', false));
  t.assert(plus !== null && isTerminalDefinition(plus));
});

test('keeps the order of the rules and fields in the documents', t => {
  const grammar = parseGrammar({
    name: 'ordered',
    rules: {
      zeta: { type: 'SYMBOL', name: 'alpha' },
      alpha: { type: 'FIELD', name: 'value', content: { type: 'BLANK' } },
    },
  });
  t.deepEqual(grammar.getRuleNames(), [ 'zeta', 'alpha' ]);
  t.deepEqual(grammar.getRule('zeta'), sym(id('alpha')));
  t.deepEqual(grammar.getRule('alpha'), field(id('value'), { type: 'BLANK' }));
  t.is(grammar.inherits, null);
  t.deepEqual(grammar.extras, []);
  const nodeTypes = parseNodeTypes([
    {
      type: 'pair',
      named: true,
      fields: {
        value: { multiple: false, required: true, types: [ { type: 'x', named: true } ] },
        key: { multiple: false, required: true, types: [ { type: 'x', named: true } ] },
      },
    },
    { type: 'x', named: true },
  ]);
  const pair = nodeTypes.getDefinition(createNodeType('pair'));
  t.assert(pair !== null && pair.kind.kind === 'regular' && pair.kind.fields !== null);
  if (pair !== null && pair.kind.kind === 'regular' && pair.kind.fields !== null) {
    t.deepEqual([...pair.kind.fields.keys()], [ 'value', 'key' ]);
  }
});

test('reads the reserved words of a grammar', t => {
  const grammar = parseGrammar({
    name: 'reserved',
    rules: {
      program: { type: 'SYMBOL', name: 'identifier' },
      identifier: { type: 'PATTERN', value: '[a-z]+' },
    },
    reserved: {
      global: [ { type: 'STRING', value: 'if' } ],
    },
  });
  t.deepEqual(grammar.getReservedContextNames(), [ 'global' ]);
});

test('rejects a rule with an unknown type', t => {
  const error = t.throws(() => readGrammarFile(getFixturePath('invalid-grammar.json')), { instanceOf: SchemaReadError });
  t.is(error?.document, 'grammar.json');
  t.is(error?.filePath, getFixturePath('invalid-grammar.json'));
  t.is(error?.issues.length, 1);
  t.assert(error?.issues[0].startsWith('rules.program.type: '));
});

test('rejects names that are not identifiers', t => {
  const error = t.throws(() => parseGrammar({ name: 'bad name', rules: {} }), { instanceOf: SchemaReadError });
  t.deepEqual(error?.issues, [ "name: 'bad name' is not a valid identifier" ]);
});

test('rejects a node type without a name', t => {
  const error = t.throws(() => parseNodeTypes([ { named: true } ]), { instanceOf: SchemaReadError });
  t.is(error?.document, 'node-types.json');
});

test('reports files that are missing or do not contain valid JSON', t => {
  const missing = t.throws(() => readNodeTypesFile(getFixturePath('missing.json')), { instanceOf: SchemaReadError });
  t.is(missing?.document, 'node-types.json');
  t.is(missing?.issues.length, 1);
  const malformed = t.throws(() => readGrammarFile(getFixturePath('malformed.json')), { instanceOf: SchemaReadError });
  t.is(malformed?.filePath, getFixturePath('malformed.json'));
});
