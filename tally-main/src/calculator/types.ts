export type TokenType =
  | "NUMBER"
  | "IDENT"
  | "PLUS"
  | "MINUS"
  | "STAR"
  | "SLASH"
  | "DOUBLE_SLASH"
  | "POWER"
  | "PERCENT"
  | "BANG"
  | "LPAREN"
  | "RPAREN"
  | "COMMA"
  | "EOF";

export interface Token {
  type: TokenType;
  value: string;
  pos: number;
}

export type FunctionName =
  | "sin"
  | "cos"
  | "tan"
  | "asin"
  | "acos"
  | "atan"
  | "exp"
  | "log"
  | "log10"
  | "sqrt"
  | "floor"
  | "ceil"
  | "round"
  | "abs";

export type UnaryOperator = "-" | "+" | "!";

export type BinaryOperator = "+" | "-" | "*" | "/" | "//" | "%" | "**";

export type SyntaxNode =
  | { kind: "number"; value: number; pos: number }
  | { kind: "ident"; name: string; pos: number }
  | { kind: "unary"; op: UnaryOperator; operand: SyntaxNode; pos: number }
  | { kind: "binary"; op: BinaryOperator; left: SyntaxNode; right: SyntaxNode; pos: number }
  | { kind: "call"; fn: FunctionName; argument: SyntaxNode; pos: number };

export type AngleMode = "deg" | "rad";

export type CalcErrorCode =
  | "EMPTY_EXPRESSION"
  | "SYNTAX_ERROR"
  | "INVALID_CHARACTER"
  | "UNKNOWN_IDENTIFIER"
  | "DIVISION_BY_ZERO"
  | "DOMAIN_ERROR"
  | "OVERFLOW"
  | "VALUE_ERROR";

export class CalcError extends Error {
  constructor(
    message: string,
    public pos: number,
    public code: CalcErrorCode,
  ) {
    super(message);
    this.name = "CalcError";
  }
}
