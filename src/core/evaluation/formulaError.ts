import type { EvaluationError } from "./formulaEvaluator.types.ts";

export enum FormulaErrorType {
  INVALID_REFERENCE = "INVALID_REFERENCE",
  COLUMN_INDEX_OUT_OF_RANGE = "COLUMN_INDEX_OUT_OF_RANGE",
  ARITHMETIC_INVALID = "ARITHMETIC_INVALID",
  ARITY_ERROR = "ARITY_ERROR",
  NOT_IMPLEMENTED = "NOT_IMPLEMENTED",
  INTERNAL_FAILURE = "INTERNAL_FAILURE",
  INVALID_EXPRESSION = "INVALID_EXPRESSION",
}

export const formulaError = (
  error: FormulaErrorType,
  message: string,
): EvaluationError => ({ ok: false, error, message });

export const ok = <T>(value: T): { ok: true; value: T } => ({
  ok: true,
  value,
});
