export { default as FormulaHandler } from "./core/formulaHandler.ts";
export { default as FormulaEvaluator } from "./core/evaluation/formulaEvaluator.ts";
export { default as ResultCache } from "./core/evaluation/resultCache.ts";
export { evaluateTree } from "./core/evaluation/formulaWalker.ts";
export {
  default as FormulaParser,
  FormulaParseError,
} from "./core/parsing/formulaParser.ts";
export {
  FormulaErrorType,
  formulaError,
  ok,
} from "./core/evaluation/formulaError.ts";
export type {
  BinaryOperator,
  CellNode,
  CellRangeNode,
  ColumnValue,
  ComparisonOperator,
  EvaluationError,
  EvaluationResult,
  FormulaNode,
  FormulaValue,
  UnaryOperator,
} from "./core/evaluation/formulaEvaluator.types.ts";
export type { FormulaOptions } from "./main.types.ts";
