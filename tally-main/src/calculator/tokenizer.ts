import { CalcError, type Token, type TokenType } from "./types.js";

const TWO_CHAR_TOKENS: Record<string, TokenType> = {
  "**": "POWER",
  "//": "DOUBLE_SLASH",
};

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  "+": "PLUS",
  "-": "MINUS",
  "*": "STAR",
  "/": "SLASH",
  "^": "POWER",
  "%": "PERCENT",
  "!": "BANG",
  "(": "LPAREN",
  ")": "RPAREN",
  ",": "COMMA",
};

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isAlpha(ch: string | undefined): boolean {
  return ch !== undefined && ((ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_");
}

function isAlphaNum(ch: string | undefined): boolean {
  return isAlpha(ch) || isDigit(ch);
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function readNumber(input: string, start: number): Token {
  let i = start;

  while (isDigit(input[i])) i++;

  // Fraction; a trailing point ("3.") is accepted
  if (input[i] === ".") {
    i++;
    while (isDigit(input[i])) i++;
  }

  // Exponent, only when digits follow so that "2e" stays NUMBER IDENT
  if (input[i] === "e" || input[i] === "E") {
    let j = i + 1;
    if (input[j] === "+" || input[j] === "-") j++;
    if (isDigit(input[j])) {
      i = j;
      while (isDigit(input[i])) i++;
    }
  }

  return { type: "NUMBER", value: input.slice(start, i), pos: start };
}

function readIdent(input: string, start: number): Token {
  let i = start;
  while (isAlphaNum(input[i])) i++;
  return { type: "IDENT", value: input.slice(start, i), pos: start };
}

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input.charAt(i);

    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    if (isDigit(ch) || (ch === "." && isDigit(input[i + 1]))) {
      const tok = readNumber(input, i);
      tokens.push(tok);
      i = tok.pos + tok.value.length;
      continue;
    }

    if (isAlpha(ch)) {
      const tok = readIdent(input, i);
      tokens.push(tok);
      i = tok.pos + tok.value.length;
      continue;
    }

    const pair = input.slice(i, i + 2);
    const pairType = TWO_CHAR_TOKENS[pair];
    if (pairType) {
      tokens.push({ type: pairType, value: pair, pos: i });
      i += 2;
      continue;
    }

    const tokenType = SINGLE_CHAR_TOKENS[ch];
    if (tokenType) {
      tokens.push({ type: tokenType, value: ch, pos: i });
      i++;
      continue;
    }

    const symbol = String.fromCodePoint(input.codePointAt(i) ?? 0);
    throw new CalcError(`Unexpected character: '${symbol}'`, i, "INVALID_CHARACTER");
  }

  tokens.push({ type: "EOF", value: "", pos: i });
  return tokens;
}
