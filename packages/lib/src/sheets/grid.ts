import { z } from 'zod';
import { InvalidGridInputError, RaggedGridError } from './errors';

/** Raw cell text, rows first. */
export type Grid = ReadonlyArray<ReadonlyArray<string>>;

export type ResolvedGrid = number[][];

/** Zero-based cell position. */
export interface CellCoordinate {
  row: number;
  column: number;
}

export interface GridDimensions {
  rowCount: number;
  columnCount: number;
}

const gridCellSchema = z
  .union([z.string(), z.number().finite(), z.null()])
  .transform((value) => (value === null ? '' : String(value)));

export const gridInputSchema = z.array(z.array(gridCellSchema));

/**
 * Measure a grid, requiring every row to be as long as the first.
 * @throws RaggedGridError naming the first row that differs
 */
export function getGridDimensions(grid: Grid): GridDimensions {
  const rowCount = grid.length;
  const columnCount = rowCount > 0 ? grid[0].length : 0;

  grid.forEach((row, index) => {
    if (row.length !== columnCount) {
      throw new RaggedGridError(index, row.length, columnCount);
    }
  });

  return { rowCount, columnCount };
}

export function createEmptyGrid(rows: number, columns: number): string[][] {
  const rowCount = Math.max(0, Math.floor(rows));
  const columnCount = Math.max(0, Math.floor(columns));
  return Array.from({ length: rowCount }, () => Array<string>(columnCount).fill(''));
}

/**
 * Accepts a grid value or its JSON encoding and returns a validated,
 * rectangular grid of strings.
 */
export function parseGridInput(content: unknown): string[][] {
  let value = content;

  if (typeof content === 'string') {
    try {
      value = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidGridInputError([`Grid content is not valid JSON: ${reason}`]);
    }
  }

  const result = gridInputSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidGridInputError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  getGridDimensions(result.data);
  return result.data;
}
