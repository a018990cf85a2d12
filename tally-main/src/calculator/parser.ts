import { resolveFunctionName } from "./functions.js";
import { tokenize } from "./tokenizer.js";
import { CalcError, type SyntaxNode, type Token, type TokenType } from "./types.js";

// Binding powers
const BP_ADD = 10;
const BP_MUL = 20;
const BP_UNARY = 30;
const BP_EXP = 40;
const BP_POSTFIX = 50;

const EOF_TOKEN: Token = { type: "EOF", value: "", pos: -1 };

function label(tok: Token): string {
  return tok.type === "EOF" ? "end of expression" : `'${tok.value}'`;
}

function startsOperand(tok: Token): boolean {
  return tok.type === "NUMBER" || tok.type === "IDENT" || tok.type === "LPAREN";
}

export function parse(tokens: Token[]): SyntaxNode {
  let pos = 0;

  function peek(): Token {
    return tokens[pos] ?? tokens[tokens.length - 1] ?? EOF_TOKEN;
  }

  function advance(): Token {
    const tok = peek();
    if (pos < tokens.length) pos++;
    return tok;
  }

  function expect(type: TokenType, message: string): Token {
    const tok = peek();
    if (tok.type !== type) {
      throw new CalcError(message, tok.pos, "SYNTAX_ERROR");
    }
    return advance();
  }

  function nud(tok: Token): SyntaxNode {
    switch (tok.type) {
      case "NUMBER":
        return { kind: "number", value: Number(tok.value), pos: tok.pos };

      case "IDENT": {
        if (peek().type === "LPAREN") {
          return parseCall(tok);
        }
        return { kind: "ident", name: tok.value, pos: tok.pos };
      }

      case "LPAREN": {
        const expr = parseExpr(0);
        expect("RPAREN", `Missing closing parenthesis for '(' at position ${tok.pos}`);
        return expr;
      }

      case "PLUS":
        return { kind: "unary", op: "+", operand: parseExpr(BP_UNARY), pos: tok.pos };

      case "MINUS":
        return { kind: "unary", op: "-", operand: parseExpr(BP_UNARY), pos: tok.pos };

      default:
        throw new CalcError(`Unexpected ${label(tok)}`, tok.pos, "SYNTAX_ERROR");
    }
  }

  function parseCall(nameTok: Token): SyntaxNode {
    const fn = resolveFunctionName(nameTok.value);
    if (!fn) {
      throw new CalcError(`Unknown function: ${nameTok.value}`, nameTok.pos, "UNKNOWN_IDENTIFIER");
    }

    advance(); // skip LPAREN
    if (peek().type === "RPAREN") {
      throw new CalcError(`${nameTok.value}() expects exactly one argument`, peek().pos, "SYNTAX_ERROR");
    }

    const argument = parseExpr(0);
    if (peek().type === "COMMA") {
      throw new CalcError(`${nameTok.value}() expects exactly one argument`, peek().pos, "SYNTAX_ERROR");
    }
    expect("RPAREN", `Missing closing parenthesis for ${nameTok.value}(`);

    // factorial(x) and x! share one node shape
    if (fn === "factorial") {
      return { kind: "unary", op: "!", operand: argument, pos: nameTok.pos };
    }
    return { kind: "call", fn, argument, pos: nameTok.pos };
  }

  function led(left: SyntaxNode, tok: Token): SyntaxNode {
    switch (tok.type) {
      case "PLUS":
        return { kind: "binary", op: "+", left, right: parseExpr(BP_ADD), pos: tok.pos };
      case "MINUS":
        return { kind: "binary", op: "-", left, right: parseExpr(BP_ADD), pos: tok.pos };
      case "STAR":
        return { kind: "binary", op: "*", left, right: parseExpr(BP_MUL), pos: tok.pos };
      case "SLASH":
        return { kind: "binary", op: "/", left, right: parseExpr(BP_MUL), pos: tok.pos };
      case "DOUBLE_SLASH":
        return { kind: "binary", op: "//", left, right: parseExpr(BP_MUL), pos: tok.pos };
      case "PERCENT":
        return { kind: "binary", op: "%", left, right: parseExpr(BP_MUL), pos: tok.pos };
      case "POWER":
        // Right-associative: use BP_EXP - 1 for right side
        return { kind: "binary", op: "**", left, right: parseExpr(BP_EXP - 1), pos: tok.pos };
      case "BANG":
        return { kind: "unary", op: "!", operand: left, pos: tok.pos };
      default:
        throw new CalcError(`Unexpected ${label(tok)}`, tok.pos, "SYNTAX_ERROR");
    }
  }

  function lbp(tok: Token): number {
    switch (tok.type) {
      case "PLUS":
      case "MINUS":
        return BP_ADD;
      case "STAR":
      case "SLASH":
      case "DOUBLE_SLASH":
      case "PERCENT":
        return BP_MUL;
      case "POWER":
        return BP_EXP;
      case "BANG":
        return BP_POSTFIX;
      default:
        return 0;
    }
  }

  function parseExpr(minBp: number): SyntaxNode {
    let left = nud(advance());

    while (lbp(peek()) > minBp) {
      const tok = advance();
      left = led(left, tok);
    }

    return left;
  }

  if (peek().type === "EOF") {
    throw new CalcError("Empty expression", 0, "EMPTY_EXPRESSION");
  }

  const result = parseExpr(0);

  const trailing = peek();
  if (trailing.type !== "EOF") {
    if (trailing.type === "RPAREN") {
      throw new CalcError(`Unmatched ')' at position ${trailing.pos}`, trailing.pos, "SYNTAX_ERROR");
    }
    if (startsOperand(trailing)) {
      throw new CalcError(
        `Unexpected ${label(trailing)}: implicit multiplication is not supported, use '*'`,
        trailing.pos,
        "SYNTAX_ERROR",
      );
    }
    throw new CalcError(`Unexpected ${label(trailing)}`, trailing.pos, "SYNTAX_ERROR");
  }

  return result;
}

export function parseExpression(input: string): SyntaxNode {
  return parse(tokenize(input));
}
