/**
 * Lossless printer: concatenates every token with its trivia.
 * For any parsed tree, `printTree(tree)` returns the parsed text unchanged.
 */
import type * as AST from "./ast.js";

export function* tokensOf(node: AST.SyntaxNode): Generator<AST.Token> {
  switch (node.kind) {
    case "SourceFile":
      for (const s of node.statements) yield* tokensOf(s);
      yield node.endOfFile;
      return;
    case "ImportDecl":
      yield node.importKeyword;
      yield* node.path;
      if (node.semicolon) yield node.semicolon;
      return;
    case "VariableDecl":
      yield node.keyword;
      yield node.name;
      if (node.typeAnnotation) yield* tokensOf(node.typeAnnotation);
      yield node.equals;
      yield* tokensOf(node.value);
      if (node.semicolon) yield node.semicolon;
      return;
    case "ExpressionStmt":
      yield* tokensOf(node.expression);
      if (node.semicolon) yield node.semicolon;
      return;
    case "TypeAnnotation":
      yield node.colon;
      yield* node.tokens;
      return;
    case "Identifier":
      yield node.name;
      return;
    case "MemberReference":
      if (node.base) yield* tokensOf(node.base);
      yield node.dot;
      yield node.name;
      return;
    case "StringLiteral":
    case "NumberLiteral":
    case "BooleanLiteral":
    case "NilLiteral":
      yield node.token;
      return;
    case "ArrayLiteral":
      yield node.leftSquare;
      for (const e of node.elements) yield* tokensOf(e);
      yield node.rightSquare;
      return;
    case "ArrayElement":
      yield* tokensOf(node.value);
      if (node.trailingComma) yield node.trailingComma;
      return;
    case "CallExpression":
      yield* tokensOf(node.callee);
      yield node.leftParen;
      yield* tokensOf(node.argumentList);
      yield node.rightParen;
      return;
    case "ArgumentList":
      for (const a of node.arguments) yield* tokensOf(a);
      return;
    case "Argument":
      if (node.label) yield node.label;
      if (node.colon) yield node.colon;
      yield* tokensOf(node.value);
      if (node.trailingComma) yield node.trailingComma;
      return;
    case "BinaryExpression":
      yield* tokensOf(node.left);
      yield node.operator;
      yield* tokensOf(node.right);
      return;
    case "SequenceExpression":
      for (let i = 0; i < node.operands.length; i++) {
        yield* tokensOf(node.operands[i]);
        const op = node.operators[i];
        if (op) yield op;
      }
      return;
    case "ParenExpression":
      yield node.leftParen;
      yield* tokensOf(node.expression);
      yield node.rightParen;
      return;
  }
}

export function printToken(token: AST.Token): string {
  return token.leadingTrivia + token.text + token.trailingTrivia;
}

export function printTree(node: AST.SyntaxNode): string {
  let out = "";
  for (const t of tokensOf(node)) {
    out += printToken(t);
  }
  return out;
}

/** First token of a node; every expression has at least one. */
export function firstToken(node: AST.SyntaxNode): AST.Token | undefined {
  for (const t of tokensOf(node)) return t;
  return undefined;
}
