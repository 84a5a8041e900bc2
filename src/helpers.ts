
import ts from "typescript"

export function buildEquality(left: ts.Expression, right: ts.Expression): ts.Expression {
  return ts.factory.createBinaryExpression(
    left,
    ts.SyntaxKind.EqualsEqualsEqualsToken,
    right
  )
}

export function buildBinaryExpression(operator: ts.BinaryOperator, args: ts.Expression[]) {
  let result = args[0]
  for (let i = 1; i < args.length; i++) {
    result = ts.factory.createBinaryExpression(result, operator, args[i]);
  }
  return result;
}

/**
 * Builds `throw new Error(message)`, where each element of `parts` is either
 * literal text or an expression that is concatenated to it.
 */
export function buildThrowError(...parts: Array<string | ts.Expression>) {
  return ts.factory.createThrowStatement(
    ts.factory.createNewExpression(
      ts.factory.createIdentifier('Error'),
      undefined,
      [
        buildBinaryExpression(
          ts.SyntaxKind.PlusToken,
          parts.map(part => typeof(part) === 'string' ? ts.factory.createStringLiteral(part) : part)
        )
      ]
    )
  )
}

export function buildParameter(name: string, type: ts.TypeNode, modifiers?: readonly ts.ModifierLike[]): ts.ParameterDeclaration {
  return ts.factory.createParameterDeclaration(
    modifiers,
    undefined,
    name,
    undefined,
    type
  )
}

export function buildExportModifiers(): ts.Modifier[] {
  return [ ts.factory.createToken(ts.SyntaxKind.ExportKeyword) ];
}

export function buildPublicModifiers(...extra: ts.ModifierSyntaxKind[]): ts.Modifier[] {
  return [
    ts.factory.createToken(ts.SyntaxKind.PublicKeyword),
    ...extra.map(kind => ts.factory.createModifier(kind)),
  ];
}

/**
 * Builds `name1.name2...`, e.g. `Parser.SyntaxNode` or `this.node.text`.
 */
export function buildPropertyPath(root: ts.Expression, ...names: string[]): ts.Expression {
  let result = root;
  for (const name of names) {
    result = ts.factory.createPropertyAccessExpression(result, name);
  }
  return result;
}

export function buildMethodCall(target: ts.Expression, methodName: string, args: ts.Expression[]): ts.CallExpression {
  return ts.factory.createCallExpression(
    ts.factory.createPropertyAccessExpression(target, methodName),
    undefined,
    args
  )
}

export function buildConst(name: string, value: ts.Expression, modifiers?: readonly ts.ModifierLike[]): ts.VariableStatement {
  return ts.factory.createVariableStatement(
    modifiers,
    ts.factory.createVariableDeclarationList(
      [ ts.factory.createVariableDeclaration(name, undefined, undefined, value) ],
      ts.NodeFlags.Const
    )
  )
}

export function buildNullable(type: ts.TypeNode): ts.TypeNode {
  return ts.factory.createUnionTypeNode([
    type,
    ts.factory.createLiteralTypeNode(ts.factory.createNull()),
  ])
}

/**
 * Builds an arrow function with a single parameter, such as
 * `child => new FooNode(child)`.
 */
export function buildLambda(paramName: string, body: ts.Expression): ts.ArrowFunction {
  return ts.factory.createArrowFunction(
    undefined,
    undefined,
    [ ts.factory.createParameterDeclaration(undefined, undefined, paramName) ],
    undefined,
    ts.factory.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
    body
  )
}
