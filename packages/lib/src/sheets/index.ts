export {
  labelToIndex,
  indexToLabel,
  formatCellLabel,
  parseCellLabel,
  isCellLabel,
} from './column-label';
export type { LabelToIndexOptions } from './column-label';

export { getGridDimensions, createEmptyGrid, parseGridInput, gridInputSchema } from './grid';
export type { Grid, ResolvedGrid, CellCoordinate, GridDimensions } from './grid';

export { splitFormula, parseFormula, parseFormulaToken, parseInteger } from './formula';
export type { FormulaExpression, FormulaOperand, FormulaOperator, FormulaToken } from './formula';

export { GridEvaluator, evaluateGrid } from './grid-evaluator';
export type { EvaluationMarker, GridEvaluatorOptions } from './grid-evaluator';

export * from './errors';
