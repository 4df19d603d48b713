import { isCellLabel, parseCellLabel } from './column-label';
import { InvalidFormulaError, InvalidTokenError } from './errors';

export type FormulaOperator = '+' | '-';

export interface FormulaOperand {
  /** Token text as written, without its sign. */
  text: string;
  sign: 1 | -1;
}

export type FormulaExpression =
  | { type: 'single'; operand: FormulaOperand }
  | { type: 'binary'; left: FormulaOperand; operator: FormulaOperator; right: FormulaOperand };

interface ReferenceToken {
  type: 'reference';
  reference: string;
  row: number;
  column: number;
}

interface LiteralToken {
  type: 'literal';
  value: number;
}

export type FormulaToken = ReferenceToken | LiteralToken;

const OPERATOR_SPLIT_REGEX = /([+-])/;
const INTEGER_REGEX = /^[+-]?\d+$/;

function isOperator(token: string): token is FormulaOperator {
  return token === '+' || token === '-';
}

/**
 * Parse a signed base-10 integer. Returns null when the text is not one, or
 * when it does not fit in a safe integer.
 */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_REGEX.test(trimmed)) {
    return null;
  }

  // + 0 turns "-0" into 0
  const value = Number(trimmed) + 0;
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Split formula text on + and -, keeping the operators as tokens and
 * dropping blank fragments.
 */
export function splitFormula(text: string): string[] {
  return text
    .split(OPERATOR_SPLIT_REGEX)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * Parse the text after `=` into one operand or `operand op operand`.
 * An operator found where an operand is expected is that operand's sign,
 * so `-5`, `A1+-2` and `-A1` all parse.
 */
export function parseFormula(text: string): FormulaExpression {
  const operands: FormulaOperand[] = [];
  const operators: FormulaOperator[] = [];
  let pendingSign: 1 | -1 | null = null;

  for (const token of splitFormula(text)) {
    const expectingOperand = operands.length === operators.length;

    if (isOperator(token)) {
      if (!expectingOperand) {
        operators.push(token);
      } else if (pendingSign === null) {
        pendingSign = token === '-' ? -1 : 1;
      } else {
        throw new InvalidFormulaError(text);
      }
      continue;
    }

    operands.push({ text: token, sign: pendingSign ?? 1 });
    pendingSign = null;
  }

  if (pendingSign === null && operands.length === 1 && operators.length === 0) {
    return { type: 'single', operand: operands[0] };
  }

  if (pendingSign === null && operands.length === 2 && operators.length === 1) {
    return { type: 'binary', left: operands[0], operator: operators[0], right: operands[1] };
  }

  throw new InvalidFormulaError(text);
}

/**
 * Classify a formula token as a cell reference or an integer literal.
 */
export function parseFormulaToken(text: string): FormulaToken {
  if (isCellLabel(text)) {
    const { row, column } = parseCellLabel(text);
    return { type: 'reference', reference: text, row, column };
  }

  const value = parseInteger(text);
  if (value === null) {
    throw new InvalidTokenError(text);
  }

  return { type: 'literal', value };
}
