import type {
  BinaryOperator,
  ColumnValue,
  ComparisonOperator,
  EvaluationResult,
  FormulaNode,
  FormulaValue,
  UnaryOperator,
} from "./formulaEvaluator.types.ts";
import { FormulaErrorType, formulaError, ok } from "./formulaError.ts";
import type ResultCache from "./resultCache.ts";
import type { FormulaOptions } from "../../main.types.ts";
import { CELL_KEY_EXPRESSION, ErrorMessages } from "../../utils/constants.ts";
import FormulaHelper from "../../utils/helpers.ts";

/**
 * Evaluates single formula nodes against one row of column values.
 *
 * Operands arrive as results the walker has already computed. Functions
 * receive their argument nodes instead and read the results from the shared
 * {@link ResultCache}, which IF and IFERROR need to pick a branch.
 */
export default class FormulaEvaluator {
  private columns: readonly ColumnValue[];
  private cache: ResultCache;
  private options: FormulaOptions;

  constructor(
    columns: readonly ColumnValue[],
    cache: ResultCache,
    options: FormulaOptions = {},
  ) {
    this.columns = columns;
    this.cache = cache;
    this.options = options;
  }

  resolveColumnIndex(ref: string): EvaluationResult<number> {
    const match = CELL_KEY_EXPRESSION.exec(ref);
    if (match === null) {
      return formulaError(
        FormulaErrorType.INVALID_REFERENCE,
        ErrorMessages.invalidReference,
      );
    }

    const index = parseInt(match[1], 10) - 1;
    if (index < 0 || index >= this.columns.length) {
      return formulaError(
        FormulaErrorType.COLUMN_INDEX_OUT_OF_RANGE,
        ErrorMessages.columnOutOfRange,
      );
    }
    return ok(index);
  }

  resolveColumnValue(ref: string): EvaluationResult {
    const index = this.resolveColumnIndex(ref);
    if (!index.ok) return index;

    return ok(this.columns[index.value]);
  }

  resolveRange(startRef: string, endRef: string): EvaluationResult {
    const start = this.resolveColumnIndex(startRef);
    if (!start.ok) return start;

    const end = this.resolveColumnIndex(endRef);
    if (!end.ok) return end;

    // An inverted range is empty.
    const values: ColumnValue[] = [];
    for (let i = start.value; i <= end.value; i++) {
      values.push(this.columns[i]);
    }
    return ok(values);
  }

  evalBinary(
    operator: BinaryOperator,
    left: EvaluationResult,
    right: EvaluationResult,
  ): EvaluationResult {
    if (!left.ok) return left;
    if (!right.ok) return right;

    const a = left.value;
    const b = right.value;
    if (typeof a !== "number" || typeof b !== "number") {
      // No string or date arithmetic.
      return this.notImplemented();
    }

    return this.checkFinite(FormulaEvaluator.compute(operator, a, b));
  }

  evalComparison(
    operator: ComparisonOperator,
    left: EvaluationResult,
    right: EvaluationResult,
  ): EvaluationResult {
    if (!left.ok) return left;
    if (!right.ok) return right;

    const a = left.value;
    const b = right.value;
    if (typeof a !== "number" || typeof b !== "number") {
      return this.notImplemented();
    }

    switch (operator) {
      case "=":
        return ok(a === b);
      case "<>":
        return ok(a !== b);
      case ">":
        return ok(a > b);
      case "<":
        return ok(a < b);
      case ">=":
        return ok(a >= b);
      case "<=":
        return ok(a <= b);
    }
  }

  evalUnary(
    operator: UnaryOperator,
    operand: EvaluationResult,
  ): EvaluationResult {
    if (!operand.ok) return operand;

    const a = operand.value;
    if (typeof a !== "number") {
      return this.notImplemented();
    }
    return ok(operator === "-" ? -a : +a);
  }

  evalFunction(name: string, argNodes: readonly FormulaNode[]): EvaluationResult {
    const functionName = name.toUpperCase();
    try {
      switch (functionName) {
        case "SUM":
          return ok(
            FormulaHelper.numbersOf(this.gatherArguments(argNodes)).reduce(
              (sum, n) => sum + n,
              0,
            ),
          );

        case "AVG": {
          const numbers = FormulaHelper.numbersOf(this.gatherArguments(argNodes));
          if (numbers.length < 1) {
            return this.arityError(ErrorMessages.atLeastOneArgument);
          }
          return ok(numbers.reduce((sum, n) => sum + n, 0) / numbers.length);
        }

        case "MOD": {
          const numbers = FormulaHelper.numbersOf(this.gatherArguments(argNodes));
          if (numbers.length > 2) {
            return this.arityError(ErrorMessages.tooManyNumbers);
          }
          if (numbers.length < 2) {
            return this.arityError(ErrorMessages.twoArguments);
          }
          return this.checkFinite(numbers[0] % numbers[1]);
        }

        case "ABS": {
          const args = this.gatherArguments(argNodes);
          const flattened = FormulaHelper.flatten(args);
          const first = flattened[0];
          if (
            (flattened.length > 1 && typeof args[0] !== "number") ||
            typeof first !== "number"
          ) {
            return this.arityError(ErrorMessages.notANumber);
          }
          return ok(Math.abs(first));
        }

        case "MIN":
        case "MAX": {
          const numbers = FormulaHelper.numbersOf(this.gatherArguments(argNodes));
          if (numbers.length < 1) {
            return this.arityError(ErrorMessages.atLeastOneArgument);
          }
          return ok(
            functionName === "MIN"
              ? Math.min(...numbers)
              : Math.max(...numbers),
          );
        }

        case "COUNT":
          return ok(FormulaHelper.flatten(this.gatherArguments(argNodes)).length);

        case "OR": {
          const args = FormulaHelper.flatten(this.gatherArguments(argNodes));
          if (args.length < 1) {
            return this.arityError(ErrorMessages.atLeastOneArgument);
          }
          return ok(args.some((a) => Boolean(a)));
        }

        case "AND": {
          const args = FormulaHelper.flatten(this.gatherArguments(argNodes));
          if (args.length < 1) {
            return this.arityError(ErrorMessages.atLeastOneArgument);
          }
          return ok(args.every((a) => Boolean(a)));
        }

        case "IF": {
          if (argNodes.length !== 3) {
            return this.arityError(ErrorMessages.threeArguments);
          }
          const condition = this.cache.get(argNodes[0]);
          return condition.ok && condition.value
            ? this.cache.get(argNodes[1])
            : this.cache.get(argNodes[2]);
        }

        case "IFERROR": {
          if (argNodes.length !== 2) {
            return this.arityError(ErrorMessages.twoArguments);
          }
          const result = this.cache.get(argNodes[0]);
          return result.ok ? result : this.cache.get(argNodes[1]);
        }

        default:
          if (this.options.debug) {
            console.log(`Undefined function "${name}"`);
          }
          return this.notImplemented();
      }
    } catch (e) {
      return formulaError(
        FormulaErrorType.INTERNAL_FAILURE,
        FormulaHelper.describeFailure(e),
      );
    }
  }

  /**
   * Cached values of the argument nodes, or no arguments at all as soon as
   * one of them failed.
   */
  private gatherArguments(argNodes: readonly FormulaNode[]): FormulaValue[] {
    const args: FormulaValue[] = [];
    for (const node of argNodes) {
      const result = this.cache.get(node);
      if (!result.ok) {
        return [];
      }
      args.push(result.value);
    }
    return args;
  }

  private static compute(operator: BinaryOperator, a: number, b: number): number {
    switch (operator) {
      case "+":
        return a + b;
      case "-":
        return a - b;
      case "*":
        return a * b;
      case "/":
        return a / b;
      case "^":
        return a ** b;
      case "%":
        return a % b;
    }
  }

  private checkFinite(value: number): EvaluationResult {
    if (!Number.isFinite(value)) {
      return formulaError(
        FormulaErrorType.ARITHMETIC_INVALID,
        FormulaHelper.formatInvalidValue(value),
      );
    }
    return ok(value);
  }

  private arityError(message: string): EvaluationResult {
    return formulaError(FormulaErrorType.ARITY_ERROR, message);
  }

  private notImplemented(): EvaluationResult {
    return formulaError(
      FormulaErrorType.NOT_IMPLEMENTED,
      ErrorMessages.notImplemented,
    );
  }
}
