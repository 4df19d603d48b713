import { InvalidIndexError, InvalidLabelError, InvalidReferenceError } from './errors';

const ALPHABET_SIZE = 26;
const CHAR_CODE_A = 65;
const LETTER_REGEX = /^[A-Za-z]$/;
const CELL_LABEL_REGEX = /^([A-Za-z]+)(\d+)$/;

export interface LabelToIndexOptions {
  /** Reject `""` instead of decoding it to 0. */
  requireNonEmpty?: boolean;
}

/**
 * Decode a bijective base-26 column label (A=1 ... Z=26, AA=27) into its
 * one-based column number. Case-insensitive.
 */
export function labelToIndex(label: string, options: LabelToIndexOptions = {}): number {
  if (label.length === 0 && options.requireNonEmpty) {
    throw new InvalidLabelError(label);
  }

  let result = 0;
  for (const char of label) {
    if (!LETTER_REGEX.test(char)) {
      throw new InvalidLabelError(label, char);
    }
    result = result * ALPHABET_SIZE + (char.toUpperCase().charCodeAt(0) - CHAR_CODE_A + 1);
  }

  return result;
}

/**
 * Encode a one-based column number as its column label. Zero encodes to `""`.
 */
export function indexToLabel(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new InvalidIndexError(index);
  }

  let label = '';
  let remaining = index;

  // No zero digit, so shift down by one before each step.
  while (remaining > 0) {
    const digit = (remaining - 1) % ALPHABET_SIZE;
    label = String.fromCharCode(CHAR_CODE_A + digit) + label;
    remaining = Math.floor((remaining - 1) / ALPHABET_SIZE);
  }

  return label;
}

/**
 * Format a zero-based coordinate as a cell label, e.g. (1, 1) -> "B2".
 */
export function formatCellLabel(row: number, column: number): string {
  return `${indexToLabel(column + 1)}${row + 1}`;
}

export function isCellLabel(value: string): boolean {
  return CELL_LABEL_REGEX.test(value);
}

/**
 * Parse a cell label such as "B2" or "aa10" into a zero-based coordinate.
 * No bounds checking happens here.
 */
export function parseCellLabel(label: string): { row: number; column: number } {
  const match = label.match(CELL_LABEL_REGEX);
  if (!match) {
    throw new InvalidReferenceError(label);
  }

  const [, columnLetters, rowDigits] = match;

  return {
    row: parseInt(rowDigits, 10) - 1,
    column: labelToIndex(columnLetters, { requireNonEmpty: true }) - 1,
  };
}
