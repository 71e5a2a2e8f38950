/**
 * Package manifest lexer using Chevrotain.
 *
 * Whitespace, newlines and comments are not skipped: they go to the
 * "trivia" group so the parser can attach them to the surrounding tokens.
 */
import { createToken, Lexer, type TokenType } from "chevrotain";

export const TRIVIA_GROUP = "trivia";

// Identifiers first so keywords can name them as their longer alternative
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

// Keywords
export const Let = createToken({ name: "Let", pattern: /let/, longer_alt: Ident });
export const Var = createToken({ name: "Var", pattern: /var/, longer_alt: Ident });
export const Import = createToken({ name: "Import", pattern: /import/, longer_alt: Ident });
export const True = createToken({ name: "True", pattern: /true/, longer_alt: Ident });
export const False = createToken({ name: "False", pattern: /false/, longer_alt: Ident });
export const Nil = createToken({ name: "Nil", pattern: /nil/, longer_alt: Ident });

// Literals. A string may hold `\( ... )` interpolations as long as they
// contain no quotes; those are kept verbatim and never treated as names.
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\\r\n]|\\.)*"/,
});
export const NumberLit = createToken({
  name: "NumberLit",
  pattern: /\d[\d_]*(?:\.\d[\d_]*)?(?:[eE][+-]?\d+)?/,
});

// Punctuation
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Colon = createToken({ name: "Colon", pattern: /:/ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });

// Infix operators share one category so the grammar can consume any of them.
export const BinaryOperator = createToken({ name: "BinaryOperator", pattern: Lexer.NA });

export const HalfOpenRange = createToken({ name: "HalfOpenRange", pattern: /\.\.</, categories: [BinaryOperator] });
export const ClosedRange = createToken({ name: "ClosedRange", pattern: /\.\.\./, categories: [BinaryOperator] });
export const Dot = createToken({ name: "Dot", pattern: /\./ });
export const EqEq = createToken({ name: "EqEq", pattern: /==/, categories: [BinaryOperator] });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/, categories: [BinaryOperator] });
export const AndAnd = createToken({ name: "AndAnd", pattern: /&&/, categories: [BinaryOperator] });
export const OrOr = createToken({ name: "OrOr", pattern: /\|\|/, categories: [BinaryOperator] });
export const NilCoalesce = createToken({ name: "NilCoalesce", pattern: /\?\?/, categories: [BinaryOperator] });
export const Question = createToken({ name: "Question", pattern: /\?/ });
export const Equals = createToken({ name: "Equals", pattern: /=/ });
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: [BinaryOperator] });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: [BinaryOperator] });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: [BinaryOperator] });

// Trivia
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: TRIVIA_GROUP,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  group: TRIVIA_GROUP,
  line_breaks: true,
});
export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\n\r]*/,
  group: TRIVIA_GROUP,
});
export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*[\s\S]*?\*\//,
  group: TRIVIA_GROUP,
  line_breaks: true,
});

// Token order matters: longer/more specific tokens first
export const allTokens: TokenType[] = [
  WhiteSpace,
  Newline,
  LineComment,
  BlockComment,
  // Keywords before Ident
  Let,
  Var,
  Import,
  True,
  False,
  Nil,
  Ident,
  StringLit,
  NumberLit,
  // Multi-char operators before their prefixes
  HalfOpenRange,
  ClosedRange,
  Dot,
  EqEq,
  BangEq,
  AndAnd,
  OrOr,
  NilCoalesce,
  Question,
  Equals,
  Plus,
  Minus,
  Star,
  BinaryOperator,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Comma,
  Colon,
  Semicolon,
];

export const ManifestLexer = new Lexer(allTokens);
