/**
 * Package manifest parser using Chevrotain.
 * Produces a lossless syntax tree from tokens and trivia.
 */
import { CstParser, tokenMatcher, type CstElement, type CstNode, type IToken } from "chevrotain";
import {
  allTokens,
  BinaryOperator,
  BlockComment,
  Colon,
  Comma,
  Dot,
  Equals,
  False,
  Ident,
  Import,
  LBracket,
  Let,
  LParen,
  ManifestLexer,
  Newline,
  Nil,
  NumberLit,
  Question,
  RBracket,
  RParen,
  Semicolon,
  StringLit,
  TRIVIA_GROUP,
  True,
  Var,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

class ManifestCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  sourceFile = this.RULE("sourceFile", () => {
    this.MANY(() => {
      this.SUBRULE(this.statement);
    });
  });

  statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.importDecl) },
      { ALT: () => this.SUBRULE(this.variableDecl) },
      { ALT: () => this.SUBRULE(this.expression) },
    ]);
    this.OPTION(() => {
      this.CONSUME(Semicolon);
    });
  });

  importDecl = this.RULE("importDecl", () => {
    this.CONSUME(Import);
    this.CONSUME(Ident);
    this.MANY(() => {
      this.CONSUME(Dot);
      this.CONSUME2(Ident);
    });
  });

  variableDecl = this.RULE("variableDecl", () => {
    this.OR([
      { ALT: () => this.CONSUME(Let) },
      { ALT: () => this.CONSUME(Var) },
    ]);
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.CONSUME(Colon);
      this.SUBRULE(this.typeRef);
    });
    this.CONSUME(Equals);
    this.SUBRULE(this.expression);
  });

  typeRef = this.RULE("typeRef", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(LBracket);
          this.SUBRULE(this.typeRef);
          this.CONSUME(RBracket);
        },
      },
      {
        ALT: () => {
          this.CONSUME(Ident);
          this.MANY(() => {
            this.CONSUME(Dot);
            this.CONSUME2(Ident);
          });
        },
      },
    ]);
    this.OPTION(() => {
      this.CONSUME(Question);
    });
  });

  expression = this.RULE("expression", () => {
    this.SUBRULE(this.postfixExpression);
    this.MANY(() => {
      this.CONSUME(BinaryOperator);
      this.SUBRULE2(this.postfixExpression);
    });
  });

  postfixExpression = this.RULE("postfixExpression", () => {
    this.SUBRULE(this.primary);
    this.MANY(() => {
      this.SUBRULE(this.postfixSuffix);
    });
  });

  postfixSuffix = this.RULE("postfixSuffix", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Dot);
          this.CONSUME(Ident);
        },
      },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.argumentList);
          this.CONSUME(RParen);
        },
      },
    ]);
  });

  argumentList = this.RULE("argumentList", () => {
    this.OPTION(() => {
      this.SUBRULE(this.argument);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.argument);
      });
      this.OPTION2(() => {
        this.CONSUME2(Comma); // trailing comma
      });
    });
  });

  argument = this.RULE("argument", () => {
    this.OPTION({
      GATE: () => tokenMatcher(this.LA(2), Colon),
      DEF: () => {
        this.CONSUME(Ident);
        this.CONSUME(Colon);
      },
    });
    this.SUBRULE(this.expression);
  });

  primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(NumberLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Nil) },
      { ALT: () => this.CONSUME(Ident) },
      {
        ALT: () => {
          this.CONSUME(Dot);
          this.CONSUME2(Ident);
        },
      },
      { ALT: () => this.SUBRULE(this.arrayLiteral) },
      { ALT: () => this.SUBRULE(this.parenExpression) },
    ]);
  });

  arrayLiteral = this.RULE("arrayLiteral", () => {
    this.CONSUME(LBracket);
    this.OPTION(() => {
      this.SUBRULE(this.expression);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.expression);
      });
      this.OPTION2(() => {
        this.CONSUME2(Comma); // trailing comma
      });
    });
    this.CONSUME(RBracket);
  });

  parenExpression = this.RULE("parenExpression", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
  });
}

// Singleton parser instance
const cstParser = new ManifestCstParser();

// --- Trivia attachment ---

interface TokenTrivia {
  leading: string;
  trailing: string;
}

interface ParseContext {
  file: string;
  trivia: Map<IToken, TokenTrivia>;
}

function breaksLine(piece: IToken): boolean {
  return tokenMatcher(piece, Newline) || (tokenMatcher(piece, BlockComment) && /[\r\n]/.test(piece.image));
}

/**
 * Trivia after a token up to the first line break is its trailing trivia;
 * everything from that line break to the next token is the next token's
 * leading trivia. Whatever follows the last token belongs to end of file.
 */
function attachTrivia(tokens: IToken[], trivia: IToken[]): { map: Map<IToken, TokenTrivia>; endOfFile: string } {
  const map = new Map<IToken, TokenTrivia>();
  const triviaSet = new Set(trivia);
  const merged = [...tokens, ...trivia].sort((a, b) => a.startOffset - b.startOffset);

  let leading = "";
  let owner: TokenTrivia | undefined;
  let inTrailing = false;

  for (const piece of merged) {
    if (!triviaSet.has(piece)) {
      owner = { leading, trailing: "" };
      map.set(piece, owner);
      leading = "";
      inTrailing = true;
      continue;
    }
    if (owner && inTrailing && !breaksLine(piece)) {
      owner.trailing += piece.image;
    } else {
      inTrailing = false;
      leading += piece.image;
    }
  }
  return { map, endOfFile: leading };
}

// --- CST to tree visitor ---

function isCstNode(e: CstElement): e is CstNode {
  return "children" in e;
}

function nodes(cst: CstNode, name: string): CstNode[] {
  return (cst.children[name] ?? []).filter(isCstNode);
}

function tokens(cst: CstNode, name: string): IToken[] {
  return (cst.children[name] ?? []).filter((e): e is IToken => !isCstNode(e));
}

function node(cst: CstNode, name: string): CstNode {
  const found = nodes(cst, name)[0];
  if (!found) throw new Error(`Expected '${name}' in ${cst.name}`);
  return found;
}

function rawToken(cst: CstNode, name: string): IToken {
  const found = tokens(cst, name)[0];
  if (!found) throw new Error(`Expected token '${name}' in ${cst.name}`);
  return found;
}

function tokenType(t: IToken): AST.TokenType {
  if (tokenMatcher(t, BinaryOperator)) return "Operator";
  switch (t.tokenType.name) {
    case "Ident":
    case "Let":
    case "Var":
    case "Import":
    case "True":
    case "False":
    case "Nil":
    case "StringLit":
    case "NumberLit":
    case "LParen":
    case "RParen":
    case "LBracket":
    case "RBracket":
    case "Comma":
    case "Colon":
    case "Semicolon":
    case "Dot":
    case "Question":
    case "Equals":
      return t.tokenType.name;
    default:
      throw new Error(`Unexpected token type ${t.tokenType.name}`);
  }
}

function tokenSpanOf(t: IToken, file: string): Span {
  return {
    file,
    startLine: t.startLine ?? 1,
    startCol: t.startColumn ?? 1,
    endLine: t.endLine ?? 1,
    endCol: (t.endColumn ?? 1) + 1,
  };
}

function tok(t: IToken, ctx: ParseContext): AST.Token {
  const trivia = ctx.trivia.get(t) ?? { leading: "", trailing: "" };
  return {
    kind: "Token",
    type: tokenType(t),
    text: t.image,
    leadingTrivia: trivia.leading,
    trailingTrivia: trivia.trailing,
    span: tokenSpanOf(t, ctx.file),
  };
}

function optionalTok(t: IToken | undefined, ctx: ParseContext): AST.Token | undefined {
  return t ? tok(t, ctx) : undefined;
}

/** All tokens below a CST node, in source order. */
function collectTokens(cst: CstNode): IToken[] {
  const out: IToken[] = [];
  for (const elements of Object.values(cst.children)) {
    for (const e of elements) {
      if (isCstNode(e)) out.push(...collectTokens(e));
      else out.push(e);
    }
  }
  return out.sort((a, b) => a.startOffset - b.startOffset);
}

function visitSourceFile(cst: CstNode, ctx: ParseContext, endOfFile: AST.Token): AST.SourceFile {
  return {
    kind: "SourceFile",
    statements: nodes(cst, "statement").map((s) => visitStatement(s, ctx)),
    endOfFile,
  };
}

function visitStatement(cst: CstNode, ctx: ParseContext): AST.Stmt {
  const semicolon = optionalTok(tokens(cst, "Semicolon")[0], ctx);
  const children = cst.children;
  if (children["importDecl"]) {
    return { ...visitImportDecl(node(cst, "importDecl"), ctx), semicolon };
  }
  if (children["variableDecl"]) {
    return { ...visitVariableDecl(node(cst, "variableDecl"), ctx), semicolon };
  }
  if (children["expression"]) {
    return { kind: "ExpressionStmt", expression: visitExpression(node(cst, "expression"), ctx), semicolon };
  }
  throw new Error("Unknown statement type");
}

function visitImportDecl(cst: CstNode, ctx: ParseContext): AST.ImportDecl {
  const path = collectTokens(cst)
    .filter((t) => !tokenMatcher(t, Import))
    .map((t) => tok(t, ctx));
  return { kind: "ImportDecl", importKeyword: tok(rawToken(cst, "Import"), ctx), path };
}

function visitVariableDecl(cst: CstNode, ctx: ParseContext): AST.VariableDecl {
  const keyword = tokens(cst, "Let")[0] ?? rawToken(cst, "Var");
  const colon = tokens(cst, "Colon")[0];
  const typeRef = nodes(cst, "typeRef")[0];
  const decl: AST.VariableDecl = {
    kind: "VariableDecl",
    keyword: tok(keyword, ctx),
    name: tok(rawToken(cst, "Ident"), ctx),
    typeAnnotation:
      colon && typeRef
        ? { kind: "TypeAnnotation", colon: tok(colon, ctx), tokens: collectTokens(typeRef).map((t) => tok(t, ctx)) }
        : undefined,
    equals: tok(rawToken(cst, "Equals"), ctx),
    value: visitExpression(node(cst, "expression"), ctx),
  };
  return decl;
}

function visitExpression(cst: CstNode, ctx: ParseContext): AST.Expr {
  const operands = nodes(cst, "postfixExpression").map((p) => visitPostfixExpression(p, ctx));
  const operators = tokens(cst, "BinaryOperator").map((t) => tok(t, ctx));
  const first = operands[0];
  if (!first) throw new Error("Expression without operand");
  if (operators.length === 0) return first;
  if (operators.length === 1 && operands.length === 2) {
    return { kind: "BinaryExpression", left: first, operator: operators[0], right: operands[1] };
  }
  return { kind: "SequenceExpression", operands, operators };
}

function visitPostfixExpression(cst: CstNode, ctx: ParseContext): AST.Expr {
  let expr = visitPrimary(node(cst, "primary"), ctx);
  for (const suffix of nodes(cst, "postfixSuffix")) {
    const dot = tokens(suffix, "Dot")[0];
    if (dot) {
      expr = { kind: "MemberReference", base: expr, dot: tok(dot, ctx), name: tok(rawToken(suffix, "Ident"), ctx) };
      continue;
    }
    expr = {
      kind: "CallExpression",
      callee: expr,
      leftParen: tok(rawToken(suffix, "LParen"), ctx),
      argumentList: visitArgumentList(node(suffix, "argumentList"), ctx),
      rightParen: tok(rawToken(suffix, "RParen"), ctx),
    };
  }
  return expr;
}

function visitArgumentList(cst: CstNode, ctx: ParseContext): AST.ArgumentList {
  const commas = tokens(cst, "Comma");
  const args = nodes(cst, "argument").map((a, i): AST.Argument => {
    const label = tokens(a, "Ident")[0];
    const colon = tokens(a, "Colon")[0];
    return {
      kind: "Argument",
      label: optionalTok(label, ctx),
      colon: optionalTok(colon, ctx),
      value: visitExpression(node(a, "expression"), ctx),
      trailingComma: optionalTok(commas[i], ctx),
    };
  });
  return { kind: "ArgumentList", arguments: args };
}

function visitPrimary(cst: CstNode, ctx: ParseContext): AST.Expr {
  const children = cst.children;
  if (children["StringLit"]) return { kind: "StringLiteral", token: tok(rawToken(cst, "StringLit"), ctx) };
  if (children["NumberLit"]) return { kind: "NumberLiteral", token: tok(rawToken(cst, "NumberLit"), ctx) };
  if (children["True"]) return { kind: "BooleanLiteral", token: tok(rawToken(cst, "True"), ctx) };
  if (children["False"]) return { kind: "BooleanLiteral", token: tok(rawToken(cst, "False"), ctx) };
  if (children["Nil"]) return { kind: "NilLiteral", token: tok(rawToken(cst, "Nil"), ctx) };
  if (children["Dot"]) {
    return { kind: "MemberReference", dot: tok(rawToken(cst, "Dot"), ctx), name: tok(rawToken(cst, "Ident"), ctx) };
  }
  if (children["Ident"]) return { kind: "Identifier", name: tok(rawToken(cst, "Ident"), ctx) };
  if (children["arrayLiteral"]) return visitArrayLiteral(node(cst, "arrayLiteral"), ctx);
  if (children["parenExpression"]) {
    const paren = node(cst, "parenExpression");
    return {
      kind: "ParenExpression",
      leftParen: tok(rawToken(paren, "LParen"), ctx),
      expression: visitExpression(node(paren, "expression"), ctx),
      rightParen: tok(rawToken(paren, "RParen"), ctx),
    };
  }
  throw new Error("Unknown primary expression");
}

function visitArrayLiteral(cst: CstNode, ctx: ParseContext): AST.ArrayLiteral {
  const commas = tokens(cst, "Comma");
  return {
    kind: "ArrayLiteral",
    leftSquare: tok(rawToken(cst, "LBracket"), ctx),
    elements: nodes(cst, "expression").map((e, i) => ({
      kind: "ArrayElement",
      value: visitExpression(e, ctx),
      trailingComma: optionalTok(commas[i], ctx),
    })),
    rightSquare: tok(rawToken(cst, "RBracket"), ctx),
  };
}

// --- Public API ---

export interface ParseResult {
  tree?: AST.SourceFile;
  diagnostics: Diagnostic[];
}

export function parseManifest(source: string, file: string = "Package.swift"): ParseResult {
  const lexResult = ManifestLexer.tokenize(source);
  const diagnostics: Diagnostic[] = [];

  for (const err of lexResult.errors) {
    diagnostics.push(
      makeDiag(
        "E_LEX",
        err.message,
        {
          file,
          startLine: err.line ?? 1,
          startCol: err.column ?? 1,
          endLine: err.line ?? 1,
          endCol: (err.column ?? 1) + (err.length ?? 1),
        },
        "Check for unsupported characters or unclosed strings."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser.sourceFile();

  for (const err of cstParser.errors) {
    diagnostics.push(
      makeDiag("E_PARSE", err.message, tokenSpanOf(err.token, file), "Check syntax near this location.")
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  const { map, endOfFile } = attachTrivia(lexResult.tokens, lexResult.groups[TRIVIA_GROUP] ?? []);
  const ctx: ParseContext = { file, trivia: map };

  try {
    const eof: AST.Token = { kind: "Token", type: "EndOfFile", text: "", leadingTrivia: endOfFile, trailingTrivia: "" };
    return { tree: visitSourceFile(cst, ctx, eof), diagnostics: [] };
  } catch (e) {
    diagnostics.push(makeDiag("E_AST", e instanceof Error ? e.message : String(e)));
    return { diagnostics };
  }
}
