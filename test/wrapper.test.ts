import test from "ava";
import ts from "typescript";

import { GrammarDocument } from "../src/grammar";
import { generate } from "../src/index";
import { createNodeChildren, createNodeType, defineRegular, defineTerminal, NodeTypesDocument } from "../src/node-types";
import { blank } from "../src/rules";
import { children, id } from "./helpers";

let nextId = 1;

/**
 * Stands in for the `SyntaxNode` of the `tree-sitter` package, implementing
 * only what the generated wrappers use.
 */
class FakeSyntaxNode {

  public readonly id = nextId++;
  public readonly children: FakeSyntaxNode[] = [];
  private readonly fields = new Map<string, FakeSyntaxNode[]>();

  constructor(
    public readonly type: string,
    public readonly isNamed = true,
    public readonly text = type,
  ) {

  }

  public get namedChildren(): FakeSyntaxNode[] {
    return this.children.filter(child => child.isNamed);
  }

  public append(child: FakeSyntaxNode, fieldName?: string): this {
    this.children.push(child);
    if (fieldName !== undefined) {
      const fieldChildren = this.fields.get(fieldName);
      if (fieldChildren === undefined) {
        this.fields.set(fieldName, [ child ]);
      } else {
        fieldChildren.push(child);
      }
    }
    return this;
  }

  public childForFieldName(fieldName: string): FakeSyntaxNode | null {
    return this.fields.get(fieldName)?.[0] ?? null;
  }

  public childrenForFieldName(fieldName: string): FakeSyntaxNode[] {
    return this.fields.get(fieldName) ?? [];
  }

}

type LoadedModule = Record<string, unknown>;

function loadWrapper(nodeTypes: NodeTypesDocument): LoadedModule {
  const grammar = new GrammarDocument({ name: id('fake'), rules: [ [ id('source'), blank() ] ] });
  const code = generate(grammar, nodeTypes, { language: 'typescript', artifact: 'wrapper' });
  const { outputText } = ts.transpileModule(code, {
    compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2022 },
  });
  const loaded: LoadedModule = {};
  new Function('exports', outputText)(loaded);
  return loaded;
}

function callFunction(loaded: LoadedModule, name: string, ...args: unknown[]): unknown {
  const fn = loaded[name];
  if (typeof fn !== 'function') {
    throw new Error(`${name} is not an exported function`);
  }
  return Reflect.apply(fn, undefined, args);
}

function construct(loaded: LoadedModule, className: string, node: FakeSyntaxNode): unknown {
  const cls = loaded[className];
  if (typeof cls !== 'function') {
    throw new Error(`${className} is not an exported class`);
  }
  return Reflect.construct(cls, [ node ]);
}

function getProperty(target: unknown, name: string): unknown {
  if (typeof target !== 'object' || target === null) {
    throw new Error(`Cannot read ${name} of a value that is not an object`);
  }
  return Reflect.get(target, name);
}

function callMethod(target: unknown, name: string): unknown {
  const method = getProperty(target, name);
  if (typeof method !== 'function') {
    throw new Error(`${name} is not a method`);
  }
  return Reflect.apply(method, target, []);
}

function toArray(value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Expected an array`);
  }
  return value;
}

function createDeclarationTypes(): NodeTypesDocument {
  return new NodeTypesDocument([
    defineRegular(createNodeType('declaration'), [
      [ id('kind'), createNodeChildren(false, true, [ createNodeType('type'), createNodeType('type', false) ]) ],
    ]),
    defineTerminal(createNodeType('type')),
    defineTerminal(createNodeType('type', false)),
  ]);
}

test('wraps named and anonymous nodes with the same type in different classes', t => {
  const loaded = loadWrapper(createDeclarationTypes());
  const anonymous = new FakeSyntaxNode('declaration').append(new FakeSyntaxNode('type', false), 'kind');
  const named = new FakeSyntaxNode('declaration').append(new FakeSyntaxNode('type', true), 'kind');
  t.is(getProperty(callMethod(construct(loaded, 'DeclarationNode', anonymous), 'getKind'), 'kind'), 'anon_type');
  t.is(getProperty(callMethod(construct(loaded, 'DeclarationNode', named), 'getKind'), 'kind'), 'type');
});

test('refuses to wrap a node that is not part of the union', t => {
  const loaded = loadWrapper(createDeclarationTypes());
  t.throws(() => callFunction(loaded, 'wrapTypeOrAnonTypeNode', new FakeSyntaxNode('number')), {
    message: 'Cannot wrap a node of type number as TypeOrAnonTypeNode',
  });
});

test('does not return children that belong to a field', t => {
  const loaded = loadWrapper(new NodeTypesDocument([
    defineRegular(createNodeType('function'), [
      [ id('name'), children(false, true, 'identifier') ],
    ], children(true, false, 'identifier'), { root: true }),
    defineTerminal(createNodeType('identifier')),
    defineTerminal(createNodeType('(', false)),
    defineTerminal(createNodeType(')', false)),
  ]));
  const node = new FakeSyntaxNode('function')
    .append(new FakeSyntaxNode('identifier', true, 'f'), 'name')
    .append(new FakeSyntaxNode('(', false))
    .append(new FakeSyntaxNode('identifier', true, 'x'))
    .append(new FakeSyntaxNode(')', false));
  const wrapped = callFunction(loaded, 'wrapTree', { rootNode: node });
  t.is(getProperty(wrapped, 'kind'), 'function');
  t.is(getProperty(callMethod(wrapped, 'getName'), 'text'), 'f');
  t.deepEqual(toArray(callMethod(wrapped, 'getChildren')).map(child => getProperty(child, 'text')), [ 'x' ]);
});

test('returns null for a missing optional child', t => {
  const loaded = loadWrapper(new NodeTypesDocument([
    defineRegular(createNodeType('return_statement'), [
      [ id('label'), children(false, false, 'identifier') ],
    ], children(false, false, 'identifier')),
    defineTerminal(createNodeType('identifier')),
  ]));
  const labelOnly = new FakeSyntaxNode('return_statement')
    .append(new FakeSyntaxNode('identifier', true, 'outer'), 'label');
  const wrapped = construct(loaded, 'ReturnStatementNode', labelOnly);
  t.is(getProperty(callMethod(wrapped, 'getLabel'), 'text'), 'outer');
  t.is(callMethod(wrapped, 'getChild'), null);
  const both = new FakeSyntaxNode('return_statement')
    .append(new FakeSyntaxNode('identifier', true, 'outer'), 'label')
    .append(new FakeSyntaxNode('identifier', true, 'value'));
  t.is(getProperty(callMethod(construct(loaded, 'ReturnStatementNode', both), 'getChild'), 'text'), 'value');
});

test('throws when a required field is missing', t => {
  const loaded = loadWrapper(createDeclarationTypes());
  const wrapped = construct(loaded, 'DeclarationNode', new FakeSyntaxNode('declaration'));
  t.throws(() => callMethod(wrapped, 'getKind'), { message: "Syntax tree is missing field 'kind'" });
});
