/**
 * Error codes for grid evaluation failures
 */
export type GridErrorCode =
  | 'RAGGED_GRID'
  | 'INVALID_LABEL'
  | 'INVALID_INDEX'
  | 'INVALID_REFERENCE'
  | 'INVALID_CELL_VALUE'
  | 'INVALID_FORMULA'
  | 'INVALID_TOKEN'
  | 'OUT_OF_RANGE'
  | 'CIRCULAR_REFERENCE'
  | 'INVALID_GRID_INPUT'

/**
 * Base class for every error raised while building or evaluating a grid.
 * The `code` lets callers branch without instanceof checks across bundles.
 */
export abstract class GridError extends Error {
  readonly code: GridErrorCode

  constructor(message: string, code: GridErrorCode) {
    super(message)
    this.code = code
  }
}

export const isGridError = (value: unknown): value is GridError => {
  return value instanceof GridError
}

export class RaggedGridError extends GridError {
  readonly name = 'RaggedGridError' as const
  readonly row: number
  readonly length: number
  readonly expectedLength: number

  constructor(row: number, length: number, expectedLength: number) {
    super(
      `All rows must have the same number of columns: row ${row + 1} has ${length}, expected ${expectedLength}`,
      'RAGGED_GRID'
    )
    this.row = row
    this.length = length
    this.expectedLength = expectedLength
  }
}

export class InvalidLabelError extends GridError {
  readonly name = 'InvalidLabelError' as const
  readonly label: string

  constructor(label: string, character?: string) {
    super(
      character === undefined
        ? 'Column label must not be empty'
        : `Invalid character "${character}" in column label "${label}". Only letters A-Z are allowed`,
      'INVALID_LABEL'
    )
    this.label = label
  }
}

export class InvalidIndexError extends GridError {
  readonly name = 'InvalidIndexError' as const
  readonly index: number

  constructor(index: number) {
    super(`Column index must be a non-negative integer, got ${index}`, 'INVALID_INDEX')
    this.index = index
  }
}

export class InvalidReferenceError extends GridError {
  readonly name = 'InvalidReferenceError' as const
  readonly reference: string

  constructor(reference: string) {
    super(`Invalid cell reference: ${reference}`, 'INVALID_REFERENCE')
    this.reference = reference
  }
}

export class InvalidCellValueError extends GridError {
  readonly name = 'InvalidCellValueError' as const
  readonly label: string
  readonly row: number
  readonly column: number
  readonly raw: string

  /**
   * @param row - one-based row number
   * @param column - one-based column number
   */
  constructor(label: string, row: number, column: number, raw: string) {
    super(`Invalid cell value at ${label} (row ${row}, column ${column}): ${raw}`, 'INVALID_CELL_VALUE')
    this.label = label
    this.row = row
    this.column = column
    this.raw = raw
  }
}

export class InvalidFormulaError extends GridError {
  readonly name = 'InvalidFormulaError' as const
  readonly formula: string

  constructor(formula: string, reason?: string) {
    super(reason ? `Invalid formula: ${formula} (${reason})` : `Invalid formula: ${formula}`, 'INVALID_FORMULA')
    this.formula = formula
  }
}

export class InvalidTokenError extends GridError {
  readonly name = 'InvalidTokenError' as const
  readonly token: string

  constructor(token: string) {
    super(`Invalid token: ${token}`, 'INVALID_TOKEN')
    this.token = token
  }
}

export class OutOfRangeError extends GridError {
  readonly name = 'OutOfRangeError' as const
  readonly reference: string
  readonly rowCount: number
  readonly columnCount: number

  constructor(reference: string, rowCount: number, columnCount: number) {
    super(
      `Reference out of range: ${reference} (grid has ${rowCount} rows and ${columnCount} columns)`,
      'OUT_OF_RANGE'
    )
    this.reference = reference
    this.rowCount = rowCount
    this.columnCount = columnCount
  }
}

export class CircularReferenceError extends GridError {
  readonly name = 'CircularReferenceError' as const
  readonly label: string

  constructor(label: string) {
    super(`Circular reference detected at ${label}`, 'CIRCULAR_REFERENCE')
    this.label = label
  }
}

export class InvalidGridInputError extends GridError {
  readonly name = 'InvalidGridInputError' as const
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid grid input:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, 'INVALID_GRID_INPUT')
    this.issues = issues
  }
}
