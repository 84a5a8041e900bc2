
import pluralize from "pluralize"
import ts from "typescript"

import type { EmissionRequest, EmissionUnit, FieldSpec, UnionUnit } from "../emission";
import { RenderError } from "../errors";
import {
  buildConst,
  buildEquality,
  buildExportModifiers,
  buildLambda,
  buildMethodCall,
  buildNullable,
  buildParameter,
  buildPropertyPath,
  buildPublicModifiers,
  buildThrowError,
} from "../helpers";
import { toPascalCase } from "../identifier";
import { type NodeType, nodeTypeKey } from "../node-types";
import { uniqueBy } from "../util";
import { getConstants } from "./constants";
import type { Artifact, EmissionBackend } from "./index";

const LANGUAGE = 'typescript';

const PARSER_MODULE = 'tree-sitter';

const NODE_KIND = 'NodeKind';
const EXPECT_NODE = 'expectNode';
const HAS_KIND = 'hasKind';
const UNASSIGNED_CHILDREN = 'unassignedChildren';
const WRAP_TREE = 'wrapTree';

/**
 * Keeps track of the names that were already used in the generated code so
 * that two declarations never get the same name.
 */
class NameRegistry {

  private readonly owners = new Map<string, string>();

  public claim(name: string, owner: string): string {
    const existing = this.owners.get(name);
    if (existing !== undefined) {
      throw new RenderError(LANGUAGE, `${existing} and ${owner} would both be named ${name}`);
    }
    this.owners.set(name, owner);
    return name;
  }

}

export function getClassName(name: string): string {
  const pascal = toPascalCase(name);
  return `${/^[A-Za-z_]/.test(pascal) ? pascal : '_' + pascal}Node`;
}

export function getWrapFunctionName(name: string): string {
  return `wrap${getClassName(name)}`;
}

export function getAccessorName(field: FieldSpec): string {
  if (field.positional) {
    return field.cardinality === 'repeated' ? 'getChildren' : 'getChild';
  }
  return 'get' + toPascalCase(field.cardinality === 'repeated' ? pluralize(field.name) : field.name);
}

/**
 * Get the accessor names of all fields of a node.
 *
 * A repeated field whose plural name is already the name of another field
 * gets a `List` suffix instead, e.g. `item` next to `items` becomes
 * `getItemList`.
 */
export function getAccessorNames(fields: readonly FieldSpec[]): string[] {
  const preferred = fields.map(getAccessorName);
  return fields.map((field, i) => {
    const name = preferred[i];
    if (field.positional || field.cardinality !== 'repeated'
        || !preferred.some((other, j) => j !== i && other === name)) {
      return name;
    }
    return `get${toPascalCase(field.name)}List`;
  });
}

function buildSyntaxNodeType(): ts.TypeNode {
  return ts.factory.createTypeReferenceNode(
    ts.factory.createQualifiedName(ts.factory.createIdentifier('Parser'), 'SyntaxNode')
  );
}

function buildNodeKindsType(): ts.TypeNode {
  return ts.factory.createTypeOperatorNode(
    ts.SyntaxKind.ReadonlyKeyword,
    ts.factory.createArrayTypeNode(ts.factory.createTypeReferenceNode(NODE_KIND))
  );
}

function buildReadonlyStringArrayType(): ts.TypeNode {
  return ts.factory.createTypeOperatorNode(
    ts.SyntaxKind.ReadonlyKeyword,
    ts.factory.createArrayTypeNode(ts.factory.createKeywordTypeNode(ts.SyntaxKind.StringKeyword))
  );
}

/**
 * Builds a list like `[["identifier", true], ["+", false]]` that can be
 * passed where a `readonly NodeKind[]` is expected.
 */
function buildNodeKinds(nodeTypes: readonly NodeType[]): ts.Expression {
  return ts.factory.createArrayLiteralExpression(
    nodeTypes.map(nodeType =>
      ts.factory.createArrayLiteralExpression([
        ts.factory.createStringLiteral(nodeType.type),
        nodeType.named ? ts.factory.createTrue() : ts.factory.createFalse(),
      ])
    )
  );
}

function buildStringList(values: readonly string[]): ts.Expression {
  return ts.factory.createArrayLiteralExpression(values.map(value => ts.factory.createStringLiteral(value)));
}

/**
 * Builds `node.type === "foo" && node.isNamed`, or the same test with
 * `!node.isNamed` for anonymous node types.
 */
function buildKindTest(node: ts.Expression, nodeType: NodeType): ts.Expression {
  const isNamed = buildPropertyPath(node, 'isNamed');
  return ts.factory.createBinaryExpression(
    buildEquality(buildPropertyPath(node, 'type'), ts.factory.createStringLiteral(nodeType.type)),
    ts.SyntaxKind.AmpersandAmpersandToken,
    nodeType.named ? isNamed : ts.factory.createPrefixUnaryExpression(ts.SyntaxKind.ExclamationToken, isNamed)
  );
}

function buildHelpers(): ts.Statement[] {

  const node = ts.factory.createIdentifier('node');
  const child = ts.factory.createIdentifier('child');
  const kind = ts.factory.createIdentifier('kind');

  return [

    // type NodeKind = readonly [string, boolean];
    ts.factory.createTypeAliasDeclaration(
      undefined,
      NODE_KIND,
      undefined,
      ts.factory.createTypeOperatorNode(
        ts.SyntaxKind.ReadonlyKeyword,
        ts.factory.createTupleTypeNode([
          ts.factory.createKeywordTypeNode(ts.SyntaxKind.StringKeyword),
          ts.factory.createKeywordTypeNode(ts.SyntaxKind.BooleanKeyword),
        ])
      )
    ),

    // function expectNode(node: Parser.SyntaxNode | null, description: string): Parser.SyntaxNode {
    //   if (node === null) {
    //     throw new Error("Syntax tree is missing " + description);
    //   }
    //   return node;
    // }
    ts.factory.createFunctionDeclaration(
      undefined,
      undefined,
      EXPECT_NODE,
      undefined,
      [
        buildParameter('node', buildNullable(buildSyntaxNodeType())),
        buildParameter('description', ts.factory.createKeywordTypeNode(ts.SyntaxKind.StringKeyword)),
      ],
      buildSyntaxNodeType(),
      ts.factory.createBlock([
        ts.factory.createIfStatement(
          buildEquality(node, ts.factory.createNull()),
          ts.factory.createBlock([
            buildThrowError('Syntax tree is missing ', ts.factory.createIdentifier('description')),
          ], true)
        ),
        ts.factory.createReturnStatement(node),
      ], true)
    ),

    // function hasKind(node: Parser.SyntaxNode, kinds: readonly NodeKind[]): boolean {
    //   return kinds.some(kind => node.type === kind[0] && node.isNamed === kind[1]);
    // }
    ts.factory.createFunctionDeclaration(
      undefined,
      undefined,
      HAS_KIND,
      undefined,
      [
        buildParameter('node', buildSyntaxNodeType()),
        buildParameter('kinds', buildNodeKindsType()),
      ],
      ts.factory.createKeywordTypeNode(ts.SyntaxKind.BooleanKeyword),
      ts.factory.createBlock([
        ts.factory.createReturnStatement(
          buildMethodCall(ts.factory.createIdentifier('kinds'), 'some', [
            buildLambda('kind', ts.factory.createBinaryExpression(
              buildEquality(buildPropertyPath(node, 'type'), ts.factory.createElementAccessExpression(kind, 0)),
              ts.SyntaxKind.AmpersandAmpersandToken,
              buildEquality(buildPropertyPath(node, 'isNamed'), ts.factory.createElementAccessExpression(kind, 1))
            )),
          ])
        ),
      ], true)
    ),

    // function unassignedChildren(node: Parser.SyntaxNode, fieldNames: readonly string[], kinds: readonly NodeKind[]): Parser.SyntaxNode[] {
    //   const assigned = new Set(fieldNames.flatMap(fieldName => node.childrenForFieldName(fieldName).map(child => child.id)));
    //   return node.namedChildren.filter(child => !assigned.has(child.id) && hasKind(child, kinds));
    // }
    ts.factory.createFunctionDeclaration(
      undefined,
      undefined,
      UNASSIGNED_CHILDREN,
      undefined,
      [
        buildParameter('node', buildSyntaxNodeType()),
        buildParameter('fieldNames', buildReadonlyStringArrayType()),
        buildParameter('kinds', buildNodeKindsType()),
      ],
      ts.factory.createArrayTypeNode(buildSyntaxNodeType()),
      ts.factory.createBlock([
        buildConst(
          'assigned',
          ts.factory.createNewExpression(
            ts.factory.createIdentifier('Set'),
            undefined,
            [
              buildMethodCall(ts.factory.createIdentifier('fieldNames'), 'flatMap', [
                buildLambda('fieldName', buildMethodCall(
                  buildMethodCall(node, 'childrenForFieldName', [ ts.factory.createIdentifier('fieldName') ]),
                  'map',
                  [ buildLambda('child', buildPropertyPath(child, 'id')) ]
                )),
              ]),
            ]
          )
        ),
        ts.factory.createReturnStatement(
          buildMethodCall(buildPropertyPath(node, 'namedChildren'), 'filter', [
            buildLambda('child', ts.factory.createBinaryExpression(
              ts.factory.createPrefixUnaryExpression(
                ts.SyntaxKind.ExclamationToken,
                buildMethodCall(ts.factory.createIdentifier('assigned'), 'has', [ buildPropertyPath(child, 'id') ])
              ),
              ts.SyntaxKind.AmpersandAmpersandToken,
              ts.factory.createCallExpression(
                ts.factory.createIdentifier(HAS_KIND),
                undefined,
                [ child, ts.factory.createIdentifier('kinds') ]
              )
            )),
          ])
        ),
      ], true)
    ),

  ];
}

/**
 * Renders TypeScript code that wraps the syntax trees produced by the
 * `tree-sitter` package in typed classes.
 */
class WrapperGenerator {

  private readonly names = new NameRegistry();
  private readonly unitsByName = new Map<string, EmissionUnit>();

  constructor(private readonly request: EmissionRequest) {
    for (const unit of request.units) {
      this.unitsByName.set(unit.name, unit);
    }
  }

  private getUnit(name: string): EmissionUnit {
    const unit = this.unitsByName.get(name);
    if (unit === undefined) {
      throw new RenderError(LANGUAGE, `'${name}' is referenced but was never declared`);
    }
    return unit;
  }

  private buildTypeReference(name: string): ts.TypeNode {
    return ts.factory.createTypeReferenceNode(getClassName(name));
  }

  /**
   * Builds either `new FooNode(expr)` or `wrapFooNode(expr)`, depending on
   * whether `name` refers to a union.
   */
  private buildWrap(name: string, expr: ts.Expression): ts.Expression {
    if (this.getUnit(name).kind === 'union') {
      return ts.factory.createCallExpression(
        ts.factory.createIdentifier(getWrapFunctionName(name)),
        undefined,
        [ expr ]
      );
    }
    return ts.factory.createNewExpression(
      ts.factory.createIdentifier(getClassName(name)),
      undefined,
      [ expr ]
    );
  }

  private buildUnion(unit: UnionUnit): ts.Statement[] {

    const className = this.names.claim(getClassName(unit.name), `union '${unit.name}'`);
    const wrapName = this.names.claim(getWrapFunctionName(unit.name), `the wrap function of '${unit.name}'`);

    const cases = uniqueBy(
      unit.concreteVariants.map(variant => {
        const variantUnit = this.getUnit(variant);
        if (variantUnit.nodeType === null) {
          throw new RenderError(LANGUAGE, `variant '${variant}' of '${unit.name}' does not have a node type`);
        }
        return { nodeType: variantUnit.nodeType, name: variant };
      }),
      variant => nodeTypeKey(variant.nodeType)
    );

    const node = ts.factory.createIdentifier('node');

    return [

      // export type FooNode
      //   = BarNode
      //   | BazNode
      ts.factory.createTypeAliasDeclaration(
        buildExportModifiers(),
        className,
        undefined,
        unit.variants.length === 0
          ? ts.factory.createKeywordTypeNode(ts.SyntaxKind.NeverKeyword)
          : ts.factory.createUnionTypeNode(unit.variants.map(variant => this.buildTypeReference(variant)))
      ),

      // export function wrapFooNode(node: Parser.SyntaxNode): FooNode {
      //   if (node.type === "bar" && node.isNamed) {
      //     return new BarNode(node);
      //   }
      //   ...
      //   throw new Error("Cannot wrap a node of type " + node.type + " as FooNode");
      // }
      ts.factory.createFunctionDeclaration(
        buildExportModifiers(),
        undefined,
        wrapName,
        undefined,
        [ buildParameter('node', buildSyntaxNodeType()) ],
        ts.factory.createTypeReferenceNode(className),
        ts.factory.createBlock([
          ...cases.map(({ nodeType, name }) =>
            ts.factory.createIfStatement(
              buildKindTest(node, nodeType),
              ts.factory.createBlock([ ts.factory.createReturnStatement(this.buildWrap(name, node)) ], true)
            )
          ),
          buildThrowError(
            'Cannot wrap a node of type ',
            buildPropertyPath(node, 'type'),
            ` as ${className}`
          ),
        ], true)
      ),

    ];
  }

  /**
   * Builds the expression that looks up the syntax node(s) of a field.
   *
   * Positional children are the named children that do not belong to any of
   * the fields in `fieldNames`.
   */
  private buildFieldSource(field: FieldSpec, fieldNames: readonly string[]): ts.Expression {
    const thisNode = buildPropertyPath(ts.factory.createThis(), 'node');
    if (field.positional) {
      const children = ts.factory.createCallExpression(
        ts.factory.createIdentifier(UNASSIGNED_CHILDREN),
        undefined,
        [ thisNode, buildStringList(fieldNames), buildNodeKinds(field.concreteTypes) ]
      );
      if (field.cardinality === 'repeated') {
        return children;
      }
      return ts.factory.createBinaryExpression(
        ts.factory.createElementAccessExpression(children, 0),
        ts.SyntaxKind.QuestionQuestionToken,
        ts.factory.createNull()
      );
    }
    return buildMethodCall(
      thisNode,
      field.cardinality === 'repeated' ? 'childrenForFieldName' : 'childForFieldName',
      [ ts.factory.createStringLiteral(field.name) ]
    );
  }

  private buildAccessor(field: FieldSpec, accessorName: string, fieldNames: readonly string[]): ts.MethodDeclaration {
    const elementType = this.buildTypeReference(field.target);
    const source = this.buildFieldSource(field, fieldNames);
    const child = ts.factory.createIdentifier('child');
    let returnType: ts.TypeNode;
    let statements: ts.Statement[];
    switch (field.cardinality) {
      case 'single':
        returnType = elementType;
        statements = [
          ts.factory.createReturnStatement(
            this.buildWrap(
              field.target,
              ts.factory.createCallExpression(
                ts.factory.createIdentifier(EXPECT_NODE),
                undefined,
                [ source, ts.factory.createStringLiteral(field.positional ? 'a child' : `field '${field.name}'`) ]
              )
            )
          ),
        ];
        break;
      case 'optional':
        returnType = buildNullable(elementType);
        statements = [
          buildConst('child', source),
          ts.factory.createReturnStatement(
            ts.factory.createConditionalExpression(
              buildEquality(child, ts.factory.createNull()),
              ts.factory.createToken(ts.SyntaxKind.QuestionToken),
              ts.factory.createNull(),
              ts.factory.createToken(ts.SyntaxKind.ColonToken),
              this.buildWrap(field.target, child)
            )
          ),
        ];
        break;
      case 'repeated':
        returnType = ts.factory.createArrayTypeNode(elementType);
        statements = [
          ts.factory.createReturnStatement(
            buildMethodCall(source, 'map', [ buildLambda('child', this.buildWrap(field.target, child)) ])
          ),
        ];
        break;
    }
    return ts.factory.createMethodDeclaration(
      buildPublicModifiers(),
      undefined,
      accessorName,
      undefined,
      undefined,
      [],
      returnType,
      ts.factory.createBlock(statements, true)
    );
  }

  private buildClass(unit: EmissionUnit, fields: readonly FieldSpec[]): ts.ClassDeclaration {

    const className = this.names.claim(getClassName(unit.name), `node type '${unit.name}'`);
    const members = new NameRegistry();

    const fieldNames = fields.filter(field => !field.positional).map(field => field.name);
    const accessorNames = getAccessorNames(fields);
    const accessors = fields.map((field, i) => {
      members.claim(accessorNames[i], `field '${field.name}' of '${unit.name}'`);
      return this.buildAccessor(field, accessorNames[i], fieldNames);
    });

    // export class FooNode {
    //   public readonly kind = "foo";
    //   public constructor(public readonly node: Parser.SyntaxNode) { }
    //   public get text(): string {
    //     return this.node.text;
    //   }
    //   ...
    // }
    return ts.factory.createClassDeclaration(
      buildExportModifiers(),
      className,
      undefined,
      undefined,
      [
        ts.factory.createPropertyDeclaration(
          buildPublicModifiers(ts.SyntaxKind.ReadonlyKeyword),
          'kind',
          undefined,
          undefined,
          ts.factory.createStringLiteral(unit.name)
        ),
        ts.factory.createConstructorDeclaration(
          buildPublicModifiers(),
          [ buildParameter('node', buildSyntaxNodeType(), buildPublicModifiers(ts.SyntaxKind.ReadonlyKeyword)) ],
          ts.factory.createBlock([])
        ),
        ts.factory.createGetAccessorDeclaration(
          buildPublicModifiers(),
          'text',
          [],
          ts.factory.createKeywordTypeNode(ts.SyntaxKind.StringKeyword),
          ts.factory.createBlock([
            ts.factory.createReturnStatement(buildPropertyPath(ts.factory.createThis(), 'node', 'text')),
          ], true)
        ),
        ...accessors,
      ]
    );
  }

  private buildRoot(root: string): ts.FunctionDeclaration {
    // export function wrapTree(tree: Parser.Tree): FooNode {
    //   return new FooNode(tree.rootNode);
    // }
    return ts.factory.createFunctionDeclaration(
      buildExportModifiers(),
      undefined,
      this.names.claim(WRAP_TREE, 'the root wrap function'),
      undefined,
      [
        buildParameter(
          'tree',
          ts.factory.createTypeReferenceNode(
            ts.factory.createQualifiedName(ts.factory.createIdentifier('Parser'), 'Tree')
          )
        ),
      ],
      this.buildTypeReference(root),
      ts.factory.createBlock([
        ts.factory.createReturnStatement(
          this.buildWrap(root, buildPropertyPath(ts.factory.createIdentifier('tree'), 'rootNode'))
        ),
      ], true)
    );
  }

  public generate(): ts.Statement[] {

    for (const name of [ 'Parser', NODE_KIND, EXPECT_NODE, HAS_KIND, UNASSIGNED_CHILDREN ]) {
      this.names.claim(name, 'a helper');
    }

    // import type Parser from "tree-sitter";
    const statements: ts.Statement[] = [
      ts.factory.createImportDeclaration(
        undefined,
        ts.factory.createImportClause(true, ts.factory.createIdentifier('Parser'), undefined),
        ts.factory.createStringLiteral(PARSER_MODULE)
      ),
      ...buildHelpers(),
    ];

    for (const unit of this.request.units) {
      switch (unit.kind) {
        case 'union':
          statements.push(...this.buildUnion(unit));
          break;
        case 'compound':
          statements.push(this.buildClass(unit, unit.fields));
          break;
        case 'leaf':
          statements.push(this.buildClass(unit, []));
          break;
      }
    }

    if (this.request.root !== null) {
      statements.push(this.buildRoot(this.request.root));
    }

    return statements;
  }

}

function buildConstants(request: EmissionRequest): ts.Statement[] {
  // export const NODE_FOO = "foo";
  return getConstants(request).map(([name, value]) =>
    buildConst(name, ts.factory.createStringLiteral(value), buildExportModifiers())
  );
}

function print(header: string[], statements: ts.Statement[], fileName: string): string {
  const printer = ts.createPrinter();
  const sourceFile = ts.createSourceFile(fileName, '', ts.ScriptTarget.Latest, false, ts.ScriptKind.TS);
  let out = header.map(line => `// ${line}\n`).join('') + '\n';
  for (const statement of statements) {
    out += printer.printNode(ts.EmitHint.Unspecified, statement, sourceFile) + '\n\n';
  }
  return out.trimEnd() + '\n';
}

function render(request: EmissionRequest, artifact: Artifact): string {
  switch (artifact) {
    case 'wrapper':
      return print(
        [
          `Typed wrappers for syntax trees of the '${request.grammarName}' grammar.`,
          'Generated by typed-sitter. Do not edit by hand.',
        ],
        new WrapperGenerator(request).generate(),
        'wrapper.ts'
      );
    case 'constants':
      return print(
        [
          `Node types and field names of the '${request.grammarName}' grammar.`,
          'Generated by typed-sitter. Do not edit by hand.',
        ],
        buildConstants(request),
        'nodes.ts'
      );
  }
}

export const typescriptBackend: EmissionBackend = {
  language: LANGUAGE,
  fileExtension: 'ts',
  render,
};
