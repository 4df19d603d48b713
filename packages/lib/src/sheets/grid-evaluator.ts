import { createId } from '@paralleldrive/cuid2';
import { logger as defaultLogger, type Logger } from '../logging/logger';
import { formatCellLabel, parseCellLabel } from './column-label';
import {
  CircularReferenceError,
  InvalidCellValueError,
  InvalidFormulaError,
  OutOfRangeError,
} from './errors';
import { parseFormula, parseFormulaToken, parseInteger, type FormulaOperand } from './formula';
import { getGridDimensions, type CellCoordinate, type Grid, type ResolvedGrid } from './grid';

/**
 * Per-cell progress. A cell seen again while `in-progress` is part of a cycle.
 */
export type EvaluationMarker = 'not-started' | 'in-progress' | 'done';

export interface GridEvaluatorOptions {
  logger?: Logger;
  /** Attached to every log entry written by this evaluator. */
  evaluationId?: string;
}

/**
 * Resolves a grid of raw cell text (blank, integer literal or `=` formula)
 * into integers. Each cell is computed at most once; references are
 * followed depth-first as they are met.
 */
export class GridEvaluator {
  readonly rowCount: number;
  readonly columnCount: number;
  readonly evaluationId: string;

  private readonly cells: string[][];
  private readonly values: number[][];
  private readonly markers: EvaluationMarker[][];
  private readonly logger: Logger;

  /**
   * @throws RaggedGridError if the rows differ in length
   */
  constructor(grid: Grid, options: GridEvaluatorOptions = {}) {
    const { rowCount, columnCount } = getGridDimensions(grid);

    this.rowCount = rowCount;
    this.columnCount = columnCount;
    this.cells = grid.map((row) => [...row]);
    this.values = Array.from({ length: rowCount }, () => Array<number>(columnCount).fill(0));
    this.markers = Array.from({ length: rowCount }, () =>
      Array<EvaluationMarker>(columnCount).fill('not-started')
    );
    this.evaluationId = options.evaluationId ?? createId();
    this.logger = (options.logger ?? defaultLogger).child({ evaluationId: this.evaluationId });
  }

  /**
   * Evaluate every cell in row-major order and return a copy of the results.
   * The first error met aborts the whole call.
   */
  evaluateAll(): ResolvedGrid {
    const stopTimer = this.logger.startTimer('evaluateAll');
    this.logger.debug('Evaluating grid', { rowCount: this.rowCount, columnCount: this.columnCount });

    this.run(() => {
      for (let row = 0; row < this.rowCount; row++) {
        for (let column = 0; column < this.columnCount; column++) {
          if (this.markers[row][column] !== 'done') {
            this.resolveCell(row, column);
          }
        }
      }
    });

    const duration = stopTimer();
    this.logger.debug('Grid evaluated', {
      rowCount: this.rowCount,
      columnCount: this.columnCount,
      duration,
    });

    return this.values.map((row) => [...row]);
  }

  /** Evaluate a single cell by zero-based coordinate. */
  evaluateCell(row: number, column: number): number {
    return this.run(() => {
      if (!this.isInBounds(row, column)) {
        throw new OutOfRangeError(describeCoordinate(row, column), this.rowCount, this.columnCount);
      }
      return this.resolveCell(row, column);
    });
  }

  /** Evaluate a single cell by label, e.g. "B2". */
  evaluateReference(label: string): number {
    return this.run(() => {
      const { row, column } = this.resolveReference(label);
      return this.resolveCell(row, column);
    });
  }

  /**
   * Parse a cell label and check it against the grid bounds.
   * @throws InvalidReferenceError if the label is malformed
   * @throws OutOfRangeError if it lies outside the grid
   */
  resolveReference(label: string): CellCoordinate {
    const { row, column } = parseCellLabel(label);
    if (!this.isInBounds(row, column)) {
      throw new OutOfRangeError(label, this.rowCount, this.columnCount);
    }
    return { row, column };
  }

  getMarker(row: number, column: number): EvaluationMarker {
    if (!this.isInBounds(row, column)) {
      throw new OutOfRangeError(describeCoordinate(row, column), this.rowCount, this.columnCount);
    }
    return this.markers[row][column];
  }

  private isInBounds(row: number, column: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(column) &&
      row >= 0 &&
      row < this.rowCount &&
      column >= 0 &&
      column < this.columnCount
    );
  }

  /**
   * Runs a public evaluation entry point. On failure, cells left
   * in-progress go back to not-started so a retry reports the same error.
   */
  private run<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      this.resetInProgress();
      if (error instanceof Error) {
        this.logger.error('Grid evaluation failed', error);
      } else {
        this.logger.error('Grid evaluation failed', { error: String(error) });
      }
      throw error;
    }
  }

  private resetInProgress(): void {
    for (const row of this.markers) {
      row.forEach((marker, column) => {
        if (marker === 'in-progress') {
          row[column] = 'not-started';
        }
      });
    }
  }

  private resolveCell(row: number, column: number): number {
    const marker = this.markers[row][column];

    if (marker === 'done') {
      return this.values[row][column];
    }

    if (marker === 'in-progress') {
      throw new CircularReferenceError(formatCellLabel(row, column));
    }

    this.markers[row][column] = 'in-progress';

    const raw = this.cells[row][column];
    const content = raw.trim();
    let value: number;

    if (content === '') {
      value = 0;
    } else if (content.startsWith('=')) {
      value = this.evaluateFormula(content.slice(1).trim());
    } else {
      const parsed = parseInteger(content);
      if (parsed === null) {
        throw new InvalidCellValueError(formatCellLabel(row, column), row + 1, column + 1, raw);
      }
      value = parsed;
    }

    this.values[row][column] = value;
    this.markers[row][column] = 'done';
    return value;
  }

  private evaluateFormula(formula: string): number {
    const expression = parseFormula(formula);

    if (expression.type === 'single') {
      return this.evaluateOperand(expression.operand);
    }

    const left = this.evaluateOperand(expression.left);
    const right = this.evaluateOperand(expression.right);
    const result = expression.operator === '+' ? left + right : left - right;

    if (!Number.isSafeInteger(result)) {
      throw new InvalidFormulaError(formula, 'result is outside the safe integer range');
    }

    return result;
  }

  private evaluateOperand(operand: FormulaOperand): number {
    const value = this.evaluateToken(operand.text);
    return operand.sign === -1 ? 0 - value : value;
  }

  private evaluateToken(text: string): number {
    const token = parseFormulaToken(text);

    if (token.type === 'literal') {
      return token.value;
    }

    if (!this.isInBounds(token.row, token.column)) {
      throw new OutOfRangeError(token.reference, this.rowCount, this.columnCount);
    }

    return this.resolveCell(token.row, token.column);
  }
}

function describeCoordinate(row: number, column: number): string {
  if (Number.isInteger(row) && Number.isInteger(column) && row >= 0 && column >= 0) {
    return formatCellLabel(row, column);
  }
  return `(${row}, ${column})`;
}

/**
 * Evaluate a grid in one call.
 */
export function evaluateGrid(grid: Grid, options: GridEvaluatorOptions = {}): ResolvedGrid {
  return new GridEvaluator(grid, options).evaluateAll();
}
