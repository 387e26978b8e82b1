/**
 * Boolean expressions over contains-terms
 *
 * Grammar: terms, AND, OR (keywords are case-insensitive), parentheses and
 * double-quoted terms. Adjacent terms are joined by an implicit AND, and AND
 * binds tighter than OR. Expressions are converted to reverse Polish
 * notation with the shunting-yard algorithm before evaluation.
 */

import { InvalidInputError } from "../errors.js";
import { validatePattern } from "../validation.js";

export type ExpressionToken =
  | { kind: "term"; value: string }
  | { kind: "and" }
  | { kind: "or" }
  | { kind: "open" }
  | { kind: "close" };

type Operator = Extract<ExpressionToken, { kind: "and" | "or" }>;

export interface ParsedExpression {
  /** Terms and operators in reverse Polish order */
  rpn: Array<Extract<ExpressionToken, { kind: "term" | "and" | "or" }>>;
  /** Distinct terms in order of first appearance */
  terms: string[];
}

const PRECEDENCE: Record<Operator["kind"], number> = { and: 2, or: 1 };

function invalid(reason: string): InvalidInputError {
  return new InvalidInputError("expression", reason);
}

function isDelimiter(ch: string): boolean {
  return ch === "(" || ch === ")" || ch === '"' || /\s/u.test(ch);
}

/**
 * Split an expression into tokens, inserting implicit ANDs
 */
export function tokenize(expression: string): ExpressionToken[] {
  const raw: ExpressionToken[] = [];
  let i = 0;

  while (i < expression.length) {
    const ch = expression.charAt(i);

    if (/\s/u.test(ch)) {
      i++;
    } else if (ch === "(") {
      raw.push({ kind: "open" });
      i++;
    } else if (ch === ")") {
      raw.push({ kind: "close" });
      i++;
    } else if (ch === '"') {
      const end = expression.indexOf('"', i + 1);
      if (end === -1) {
        throw invalid("unterminated quote");
      }
      const value = expression.slice(i + 1, end);
      validatePattern(value);
      raw.push({ kind: "term", value });
      i = end + 1;
    } else {
      let end = i;
      while (end < expression.length && !isDelimiter(expression.charAt(end))) {
        end++;
      }
      const word = expression.slice(i, end);
      const keyword = word.toUpperCase();
      if (keyword === "AND") {
        raw.push({ kind: "and" });
      } else if (keyword === "OR") {
        raw.push({ kind: "or" });
      } else {
        raw.push({ kind: "term", value: word });
      }
      i = end;
    }
  }

  const tokens: ExpressionToken[] = [];
  for (const token of raw) {
    const previous = tokens[tokens.length - 1];
    const startsOperand = token.kind === "term" || token.kind === "open";
    const endsOperand = previous?.kind === "term" || previous?.kind === "close";
    if (startsOperand && endsOperand) {
      tokens.push({ kind: "and" });
    }
    tokens.push(token);
  }
  return tokens;
}

/**
 * Parse an expression into reverse Polish notation
 * @throws InvalidInputError for empty or malformed expressions
 */
export function parseExpression(expression: string): ParsedExpression {
  if (expression.trim().length === 0) {
    throw invalid("must not be empty");
  }

  const rpn: ParsedExpression["rpn"] = [];
  const stack: Array<Operator | { kind: "open" }> = [];
  const terms: string[] = [];

  for (const token of tokenize(expression)) {
    switch (token.kind) {
      case "term":
        rpn.push(token);
        if (!terms.includes(token.value)) {
          terms.push(token.value);
        }
        break;
      case "and":
      case "or": {
        for (let top = stack[stack.length - 1]; top && top.kind !== "open"; top = stack[stack.length - 1]) {
          if (PRECEDENCE[top.kind] < PRECEDENCE[token.kind]) break;
          rpn.push(top);
          stack.pop();
        }
        stack.push(token);
        break;
      }
      case "open":
        stack.push(token);
        break;
      case "close": {
        let top = stack.pop();
        while (top && top.kind !== "open") {
          rpn.push(top);
          top = stack.pop();
        }
        if (!top) {
          throw invalid("unbalanced parentheses");
        }
        break;
      }
    }
  }

  for (let top = stack.pop(); top; top = stack.pop()) {
    if (top.kind === "open") {
      throw invalid("unbalanced parentheses");
    }
    rpn.push(top);
  }

  if (terms.length === 0) {
    throw invalid("contains no terms");
  }

  let depth = 0;
  for (const token of rpn) {
    if (token.kind === "term") {
      depth++;
    } else if (depth < 2) {
      throw invalid(`dangling ${token.kind.toUpperCase()} operator`);
    } else {
      depth--;
    }
  }
  if (depth !== 1) {
    throw invalid("missing operator between operands");
  }

  return { rpn, terms };
}

/**
 * Evaluate a parsed expression with set semantics
 * @param lookup - Ids matching a single term
 */
export function evaluateExpression<T>(
  parsed: ParsedExpression,
  lookup: (term: string) => ReadonlySet<T>
): Set<T> {
  const stack: Array<Set<T>> = [];

  for (const token of parsed.rpn) {
    if (token.kind === "term") {
      stack.push(new Set(lookup(token.value)));
      continue;
    }

    const right = stack.pop();
    const left = stack.pop();
    if (!left || !right) {
      throw invalid(`dangling ${token.kind.toUpperCase()} operator`);
    }

    if (token.kind === "and") {
      stack.push(new Set([...left].filter((id) => right.has(id))));
    } else {
      stack.push(new Set([...left, ...right]));
    }
  }

  return stack.pop() ?? new Set();
}
