import type {
  BinaryOperator,
  ColumnValue,
  ComparisonOperator,
  FormulaValue,
  UnaryOperator,
} from "../core/evaluation/formulaEvaluator.types.ts";

const BINARY_OPERATORS = new Set<string>(["+", "-", "*", "/", "^", "%"]);
const COMPARISON_OPERATORS = new Set<string>(["=", "<>", ">", "<", ">=", "<="]);
const UNARY_OPERATORS = new Set<string>(["+", "-"]);

export default class FormulaHelper {
  static isBinaryOperator(operator: string): operator is BinaryOperator {
    return BINARY_OPERATORS.has(operator);
  }

  static isComparisonOperator(
    operator: string,
  ): operator is ComparisonOperator {
    return COMPARISON_OPERATORS.has(operator);
  }

  static isUnaryOperator(operator: string): operator is UnaryOperator {
    return UNARY_OPERATORS.has(operator);
  }

  // Expands range arguments one level deep.
  static flatten(args: FormulaValue[]): ColumnValue[] {
    return args.flat();
  }

  static numbersOf(args: FormulaValue[]): number[] {
    return FormulaHelper.flatten(args).filter(
      (a): a is number => typeof a === "number",
    );
  }

  static describeFailure(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
  }

  static formatInvalidValue(value: number): string {
    return `'${value}'`;
  }
}
