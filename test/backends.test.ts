import test from "ava";

import { getBackend, getBackendNames, isArtifact } from "../src/backends";
import { buildEmissionRequest } from "../src/emission";
import { RenderError, UnknownBackendError } from "../src/errors";
import { GrammarDocument } from "../src/grammar";
import { generate } from "../src/index";
import { createNodeType, defineRegular, defineTerminal, NodeTypesDocument } from "../src/node-types";
import { blank } from "../src/rules";
import { unify } from "../src/unifier";
import { children, id, loadFixture } from "./helpers";

function renderCalc(language: string, artifact: 'wrapper' | 'constants'): string {
  const [ grammar, nodeTypes ] = loadFixture('calc');
  return generate(grammar, nodeTypes, { language, artifact });
}

function getLines(code: string): string[] {
  return code.split('\n').map(line => line.trim());
}

function renderTrivial(language: string, nodeTypes: NodeTypesDocument, artifact: 'wrapper' | 'constants' = 'wrapper'): string {
  const grammar = new GrammarDocument({ name: id('trivial'), rules: [ [ id('root'), blank() ] ] });
  return getBackend(language).render(buildEmissionRequest(unify(grammar, nodeTypes)), artifact);
}

test('lists the available backends', t => {
  t.deepEqual(getBackendNames(), [ 'json', 'typescript' ]);
  t.is(getBackend('typescript').fileExtension, 'ts');
  t.is(getBackend('json').fileExtension, 'json');
  t.true(isArtifact('constants'));
  t.false(isArtifact('bindings'));
});

test('rejects a language without a backend', t => {
  const error = t.throws(() => getBackend('cobol'), { instanceOf: UnknownBackendError });
  t.is(error?.message, "No emission backend for 'cobol'. Available backends: json, typescript.");
});

test('can render TypeScript constants for node types and fields', t => {
  const code = renderCalc('typescript', 'constants');
  const lines = code.split('\n');
  t.is(lines[0], "// Node types and field names of the 'calc' grammar.");
  t.is(lines[1], '// Generated by typed-sitter. Do not edit by hand.');
  t.deepEqual(lines.filter(line => line.startsWith('export ')), [
    'export const SUPERTYPE__EXPRESSION = "_expression";',
    'export const NODE_ASSIGNMENT = "assignment";',
    'export const NODE_BINARY_EXPRESSION = "binary_expression";',
    'export const NODE_PROGRAM = "program";',
    'export const TERMINAL_ANON_DASH = "-";',
    'export const TERMINAL_ANON_EQ = "=";',
    'export const TERMINAL_ANON_PLUS = "+";',
    'export const TERMINAL_IDENTIFIER = "identifier";',
    'export const TERMINAL_NUMBER = "number";',
    'export const FIELD_LEFT = "left";',
    'export const FIELD_OPERATOR = "operator";',
    'export const FIELD_RIGHT = "right";',
  ]);
  t.true(code.endsWith('export const FIELD_RIGHT = "right";\n'));
});

test('can render TypeScript wrappers for a tree-sitter syntax tree', t => {
  const lines = getLines(renderCalc('typescript', 'wrapper'));
  t.is(lines[0], "// Typed wrappers for syntax trees of the 'calc' grammar.");
  const expected = [
    'import type Parser from "tree-sitter";',
    'function expectNode(node: Parser.SyntaxNode | null, description: string): Parser.SyntaxNode {',
    'throw new Error("Syntax tree is missing " + description);',
    'type NodeKind = readonly [string, boolean];',
    'export type ExpressionNode = BinaryExpressionNode | IdentifierNode | NumberNode;',
    'export function wrapExpressionNode(node: Parser.SyntaxNode): ExpressionNode {',
    'if (node.type === "binary_expression" && node.isNamed) {',
    'return new BinaryExpressionNode(node);',
    'throw new Error("Cannot wrap a node of type " + node.type + " as ExpressionNode");',
    'export type AnonPlusOrAnonDashNode = AnonPlusNode | AnonDashNode;',
    'if (node.type === "+" && !node.isNamed) {',
    'export class AssignmentNode {',
    'public readonly kind = "assignment";',
    'public get text(): string {',
    'return this.node.text;',
    'public getLeft(): IdentifierNode {',
    'return new IdentifierNode(expectNode(this.node.childForFieldName("left"), "field \'left\'"));',
    'public getRight(): ExpressionNode {',
    'return wrapExpressionNode(expectNode(this.node.childForFieldName("right"), "field \'right\'"));',
    'public getOperator(): AnonPlusOrAnonDashNode {',
    'public getChildren(): AssignmentNode[] {',
    'return unassignedChildren(this.node, [], [["assignment", true]]).map(child => new AssignmentNode(child));',
    'export class AnonPlusNode {',
    'export function wrapTree(tree: Parser.Tree): ProgramNode {',
    'return new ProgramNode(tree.rootNode);',
  ];
  for (const line of expected) {
    t.true(lines.includes(line), line);
  }
});

test('renders optional and repeated fields', t => {
  const nodeTypes = new NodeTypesDocument([
    defineRegular(createNodeType('prefix'), [
      [ id('base'), children(false, false, 'iri', 'blank_node') ],
      [ id('statement'), children(true, false, 'iri') ],
    ]),
    defineTerminal(createNodeType('iri')),
    defineTerminal(createNodeType('blank_node')),
  ]);
  const lines = getLines(renderTrivial('typescript', nodeTypes));
  const expected = [
    'public getBase(): IriOrBlankNodeNode | null {',
    'const child = this.node.childForFieldName("base");',
    'return child === null ? null : wrapIriOrBlankNodeNode(child);',
    'public getStatements(): IriNode[] {',
    'return this.node.childrenForFieldName("statement").map(child => new IriNode(child));',
  ];
  for (const line of expected) {
    t.true(lines.includes(line), line);
  }
});

test('refuses to give two classes the same name', t => {
  const nodeTypes = new NodeTypesDocument([
    defineTerminal(createNodeType('foo_bar')),
    defineTerminal(createNodeType('fooBar')),
  ]);
  const error = t.throws(() => renderTrivial('typescript', nodeTypes), { instanceOf: RenderError });
  t.is(error?.message, "Could not render typescript bindings: node type 'fooBar' and node type 'foo_bar' would both be named FooBarNode");
});

test('adds a suffix to constants that would otherwise get the same name', t => {
  const nodeTypes = new NodeTypesDocument([
    defineTerminal(createNodeType('select', false)),
    defineTerminal(createNodeType('SELECT', false)),
    defineTerminal(createNodeType('foo_bar')),
    defineTerminal(createNodeType('fooBar')),
  ]);
  t.is(renderTrivial('json', nodeTypes, 'constants'), JSON.stringify({
    TERMINAL_ANON_SELECT: 'SELECT',
    TERMINAL_ANON_SELECT_2: 'select',
    TERMINAL_FOO_BAR: 'fooBar',
    TERMINAL_FOO_BAR_2: 'foo_bar',
  }, null, 2) + '\n');
  const lines = renderTrivial('typescript', new NodeTypesDocument([
    defineTerminal(createNodeType('select', false)),
    defineTerminal(createNodeType('SELECT', false)),
  ]), 'constants').split('\n');
  t.deepEqual(lines.filter(line => line.startsWith('export ')), [
    'export const TERMINAL_ANON_SELECT = "SELECT";',
    'export const TERMINAL_ANON_SELECT_2 = "select";',
  ]);
});

test('falls back to a list accessor when the plural is taken by another field', t => {
  const nodeTypes = new NodeTypesDocument([
    defineRegular(createNodeType('list'), [
      [ id('item'), children(true, false, 'x') ],
      [ id('items'), children(false, true, 'x') ],
    ]),
    defineTerminal(createNodeType('x')),
  ]);
  const lines = getLines(renderTrivial('typescript', nodeTypes));
  t.true(lines.includes('public getItemList(): XNode[] {'));
  t.true(lines.includes('public getItems(): XNode {'));
});

test('refuses to give two accessors the same name', t => {
  const nodeTypes = new NodeTypesDocument([
    defineRegular(createNodeType('pair'), [
      [ id('foo_bar'), children(false, true, 'x') ],
      [ id('fooBar'), children(false, true, 'x') ],
    ]),
    defineTerminal(createNodeType('x')),
  ]);
  const error = t.throws(() => renderTrivial('typescript', nodeTypes), { instanceOf: RenderError });
  t.is(error?.message, "Could not render typescript bindings: field 'foo_bar' of 'pair' and field 'fooBar' of 'pair' would both be named getFooBar");
});

test('can render the emission request as JSON', t => {
  const [ grammar, nodeTypes ] = loadFixture('calc');
  const request = buildEmissionRequest(unify(grammar, nodeTypes));
  const json = renderCalc('json', 'wrapper');
  t.is(json, JSON.stringify(request, null, 2) + '\n');
  t.true(json.startsWith('{\n  "grammarName": "calc",\n  "root": "program",\n  "units": ['));
});

test('can render JSON constants', t => {
  t.is(renderCalc('json', 'constants'), JSON.stringify({
    SUPERTYPE__EXPRESSION: '_expression',
    NODE_ASSIGNMENT: 'assignment',
    NODE_BINARY_EXPRESSION: 'binary_expression',
    NODE_PROGRAM: 'program',
    TERMINAL_ANON_DASH: '-',
    TERMINAL_ANON_EQ: '=',
    TERMINAL_ANON_PLUS: '+',
    TERMINAL_IDENTIFIER: 'identifier',
    TERMINAL_NUMBER: 'number',
    FIELD_LEFT: 'left',
    FIELD_OPERATOR: 'operator',
    FIELD_RIGHT: 'right',
  }, null, 2) + '\n');
});
