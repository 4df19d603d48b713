import { describe, it, expect, vi, afterEach } from 'vitest';
import { GridEvaluator, evaluateGrid } from '../sheets/grid-evaluator';
import { createEmptyGrid } from '../sheets/grid';
import {
  CircularReferenceError,
  InvalidCellValueError,
  InvalidFormulaError,
  InvalidReferenceError,
  InvalidTokenError,
  OutOfRangeError,
  RaggedGridError,
} from '../sheets/errors';
import { Logger, LogLevel } from '../logging/logger';

const evaluate = (data: string[][]) => new GridEvaluator(data).evaluateAll();

const captureError = (operation: () => unknown): unknown => {
  try {
    operation();
  } catch (error) {
    return error;
  }
  throw new Error('expected operation to throw');
};

describe('grid evaluation', () => {
  it('evaluates numbers and empty cells', () => {
    expect(
      evaluate([
        ['1', '2', ''],
        ['', '3', '4'],
      ])
    ).toEqual([
      [1, 2, 0],
      [0, 3, 4],
    ]);
  });

  it('given an empty grid, should return an empty result', () => {
    expect(evaluate([])).toEqual([]);
  });

  it('given only blank cells, should return zeros of the same shape', () => {
    expect(evaluate(createEmptyGrid(3, 5))).toEqual([
      [0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0],
    ]);
  });

  it('resolves simple references', () => {
    expect(
      evaluate([
        ['1', '2', '3'],
        ['=A1', '=B1', '=C1'],
      ])
    ).toEqual([
      [1, 2, 3],
      [1, 2, 3],
    ]);
  });

  it('adds and subtracts', () => {
    expect(
      evaluate([
        ['10', '20', ''],
        ['=A1+5', '=B1-10', '=A1+B1'],
      ])
    ).toEqual([
      [10, 20, 0],
      [15, 10, 30],
    ]);
  });

  it('follows chained references', () => {
    expect(evaluate([['1', '=A1+1', '=B1+1']])).toEqual([[1, 2, 3]]);
  });

  it('evaluates dependencies out of visiting order', () => {
    expect(
      evaluate([
        ['10', '=A1+5', '=B1-3'],
        ['=C1+2', '=A1+B1', '=B2-A2'],
        ['=C1+C2', '=A2+10', '=A1-C2'],
      ])
    ).toEqual([
      [10, 15, 12],
      [14, 25, 11],
      [23, 24, -1],
    ]);
  });

  it('handles negative literals', () => {
    expect(
      evaluate([
        ['-5', '10', '=A1+B1'],
        ['=B1-C1', '=A1-15', '=A2+B2'],
      ])
    ).toEqual([
      [-5, 10, 5],
      [5, -20, -15],
    ]);
  });

  it('ignores surrounding whitespace', () => {
    expect(
      evaluate([
        [' 5 ', ' 10', ' '],
        ['= A1 + 5', ' =B1 -5 ', '= A1 + B1 '],
      ])
    ).toEqual([
      [5, 10, 0],
      [10, 5, 15],
    ]);
  });

  it('resolves column labels beyond Z', () => {
    const data = [Array<string>(30).fill('1'), ['=AA1+AB1', ...Array<string>(29).fill('')]];

    expect(evaluate(data)).toEqual([Array<number>(30).fill(1), [2, ...Array<number>(29).fill(0)]]);
  });

  it('accepts lowercase references', () => {
    expect(evaluate([['4', '=a1+a1']])).toEqual([[4, 8]]);
  });

  it('applies a leading sign to formula operands', () => {
    expect(evaluate([['5', '=-A1', '=-3', '=A1+-2', '=A1--2', '=+A1']])).toEqual([
      [5, -5, -3, 3, 7, 5],
    ]);
  });

  it('never produces negative zero', () => {
    const [[, negated]] = evaluate([['0', '=-A1']]);
    expect(Object.is(negated, 0)).toBe(true);
  });

  it('follows long dependency chains', () => {
    const length = 500;
    const row = Array.from({ length }, (_, column) =>
      column === 0 ? '1' : `=${labelFor(column - 1)}1+1`
    );

    const [result] = evaluate([row]);
    expect(result[length - 1]).toBe(length);
  });
});

describe('evaluation errors', () => {
  it('detects direct self-reference', () => {
    expect(() => evaluate([['=A1']])).toThrow(CircularReferenceError);
    expect(() => evaluate([['=A1']])).toThrow('Circular reference detected at A1');
  });

  it('detects two-cell cycles', () => {
    expect(() => evaluate([['=B1', '=A1']])).toThrow('Circular reference detected at A1');
  });

  it('detects three-cell cycles', () => {
    expect(() =>
      evaluate([
        ['=B1', '=C1', '=A1'],
        ['', '', ''],
        ['', '', ''],
      ])
    ).toThrow(CircularReferenceError);
  });

  it('reports the cycle reached first in row-major order', () => {
    const error = captureError(() => evaluate([['1', '=B1', '=C1']]));

    expect(error).toBeInstanceOf(CircularReferenceError);
    if (error instanceof CircularReferenceError) {
      expect(error.code).toBe('CIRCULAR_REFERENCE');
      expect(error.label).toBe('B1');
    }
  });

  it('rejects references outside the grid', () => {
    expect(() => evaluate([['=A2', '5']])).toThrow(OutOfRangeError);
    expect(() => evaluate([['=A2', '5']])).toThrow(
      'Reference out of range: A2 (grid has 1 rows and 2 columns)'
    );
    expect(() => evaluate([['=C1', '5']])).toThrow('Reference out of range: C1');
    expect(() => evaluate([['=A0', '5']])).toThrow('Reference out of range: A0');
  });

  it('rejects tokens that are neither references nor integers', () => {
    expect(() => evaluate([['1', '=A1+X']])).toThrow(InvalidTokenError);
    expect(() => evaluate([['1', '=A1+X']])).toThrow('Invalid token: X');
  });

  it('rejects plain cells that are not integers', () => {
    expect(() => evaluate([['abc']])).toThrow(InvalidCellValueError);
    expect(() => evaluate([['abc']])).toThrow('Invalid cell value at A1 (row 1, column 1): abc');
    expect(() => evaluate([['1', '1.5']])).toThrow('Invalid cell value at B1 (row 1, column 2): 1.5');
  });

  it('rejects formulas with more than one operator', () => {
    expect(() => evaluate([['=A1+B1+C1', '1', '2']])).toThrow(InvalidFormulaError);
    expect(() => evaluate([['=A1+B1+C1', '1', '2']])).toThrow('Invalid formula: A1+B1+C1');
    expect(() => evaluate([['=']])).toThrow(InvalidFormulaError);
    expect(() => evaluate([['=5+']])).toThrow('Invalid formula: 5+');
  });

  it('rejects results outside the safe integer range', () => {
    expect(() => evaluate([['9007199254740991', '=A1+1']])).toThrow(
      'Invalid formula: A1+1 (result is outside the safe integer range)'
    );
  });

  it('rejects ragged grids at construction', () => {
    expect(() => new GridEvaluator([['1', '2'], ['3']])).toThrow(RaggedGridError);
  });
});

describe('GridEvaluator', () => {
  it('returns identical results when evaluated twice', () => {
    const evaluator = new GridEvaluator([
      ['10', '20'],
      ['=A1+B1', '=A2-5'],
    ]);

    const first = evaluator.evaluateAll();
    const second = evaluator.evaluateAll();

    expect(first).toEqual([
      [10, 20],
      [30, 25],
    ]);
    expect(second).toEqual(first);
  });

  it('returns a copy that callers can change freely', () => {
    const evaluator = new GridEvaluator([['1', '=A1+1']]);

    const first = evaluator.evaluateAll();
    first[0][1] = 99;

    expect(evaluator.evaluateAll()).toEqual([[1, 2]]);
  });

  it('keeps its own copy of the input grid', () => {
    const data = [['1', '=A1+1']];
    const evaluator = new GridEvaluator(data);
    data[0][0] = '5';

    expect(evaluator.evaluateAll()).toEqual([[1, 2]]);
  });

  it('tracks evaluation markers per cell', () => {
    const evaluator = new GridEvaluator([['1', '=A1+1', '7']]);

    expect(evaluator.getMarker(0, 0)).toBe('not-started');
    expect(evaluator.evaluateCell(0, 1)).toBe(2);
    expect(evaluator.getMarker(0, 0)).toBe('done');
    expect(evaluator.getMarker(0, 1)).toBe('done');
    expect(evaluator.getMarker(0, 2)).toBe('not-started');
  });

  it('evaluates single cells by label', () => {
    const evaluator = new GridEvaluator([['3', '=A1-1']]);

    expect(evaluator.evaluateReference('b1')).toBe(2);
    expect(() => evaluator.evaluateReference('Z9')).toThrow(
      'Reference out of range: Z9 (grid has 1 rows and 2 columns)'
    );
  });

  it('rejects coordinates outside the grid', () => {
    const evaluator = new GridEvaluator([['1', '2', '3']]);

    expect(() => evaluator.evaluateCell(5, 0)).toThrow(
      'Reference out of range: A6 (grid has 1 rows and 3 columns)'
    );
    expect(() => evaluator.evaluateCell(-1, 0)).toThrow('Reference out of range: (-1, 0)');
    expect(() => evaluator.getMarker(0, 3)).toThrow(OutOfRangeError);
  });

  it('resolves references to coordinates', () => {
    const evaluator = new GridEvaluator([['1', '2', '3']]);

    expect(evaluator.resolveReference('C1')).toEqual({ row: 0, column: 2 });
    expect(() => evaluator.resolveReference('1A')).toThrow(InvalidReferenceError);
    expect(() => evaluator.resolveReference('D1')).toThrow(OutOfRangeError);
  });

  it('given a failed evaluation, should report the same error on retry', () => {
    const evaluator = new GridEvaluator([['=B1', '=Q']]);

    expect(() => evaluator.evaluateAll()).toThrow(InvalidTokenError);
    expect(evaluator.getMarker(0, 0)).toBe('not-started');
    expect(evaluator.getMarker(0, 1)).toBe('not-started');
    expect(() => evaluator.evaluateAll()).toThrow(InvalidTokenError);
  });

  it('keeps cells resolved before a failure', () => {
    const evaluator = new GridEvaluator([['4', '=A1+1', '=Q']]);

    expect(() => evaluator.evaluateAll()).toThrow('Invalid token: Q');
    expect(evaluator.getMarker(0, 1)).toBe('done');
    expect(evaluator.evaluateCell(0, 1)).toBe(5);
  });

  it('keeps instances independent', () => {
    const data = [['1', '=A1+1']];
    const first = new GridEvaluator(data);
    const second = new GridEvaluator(data);

    first.evaluateAll();

    expect(second.getMarker(0, 1)).toBe('not-started');
  });

  it('evaluates through the evaluateGrid helper', () => {
    expect(evaluateGrid([['2', '=A1+A1']])).toEqual([[2, 4]]);
  });
});

describe('GridEvaluator logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const jsonLogger = () => new Logger({ level: LogLevel.DEBUG, format: 'json' });

  it('logs the start and end of an evaluation with its id', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const evaluator = new GridEvaluator([['1', '=A1+1']], {
      logger: jsonLogger(),
      evaluationId: 'eval-test',
    });

    evaluator.evaluateAll();

    const entries = log.mock.calls.map(([output]) => JSON.parse(String(output)));
    expect(entries.map((entry) => entry.message)).toEqual([
      'Evaluating grid',
      'Timer [evaluateAll]',
      'Grid evaluated',
    ]);
    expect(entries[0].context).toEqual({ evaluationId: 'eval-test' });
    expect(entries[0].metadata).toEqual({ rowCount: 1, columnCount: 2 });
    expect(entries[2].level).toBe('DEBUG');
  });

  it('logs failures at error level before rethrowing', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    const evaluator = new GridEvaluator([['=A1']], {
      logger: jsonLogger(),
      evaluationId: 'eval-cycle',
    });

    expect(() => evaluator.evaluateAll()).toThrow(CircularReferenceError);

    expect(errorLog).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(errorLog.mock.calls[0][0]));
    expect(entry.level).toBe('ERROR');
    expect(entry.message).toBe('Grid evaluation failed');
    expect(entry.context).toEqual({ evaluationId: 'eval-cycle' });
    expect(entry.error.name).toBe('CircularReferenceError');
    expect(entry.error.code).toBe('CIRCULAR_REFERENCE');
    expect(entry.error.message).toBe('Circular reference detected at A1');
  });

  it('generates an evaluation id when none is given', () => {
    const evaluator = new GridEvaluator([]);
    expect(evaluator.evaluationId.length).toBeGreaterThan(0);
  });
});

function labelFor(column: number): string {
  let label = '';
  let index = column + 1;
  while (index > 0) {
    label = String.fromCharCode(65 + ((index - 1) % 26)) + label;
    index = Math.floor((index - 1) / 26);
  }
  return label;
}
