import type {
  ColumnValue,
  EvaluationResult,
  FormulaNode,
} from "./evaluation/formulaEvaluator.types.ts";
import FormulaEvaluator from "./evaluation/formulaEvaluator.ts";
import ResultCache from "./evaluation/resultCache.ts";
import { evaluateTree } from "./evaluation/formulaWalker.ts";
import { FormulaErrorType, formulaError, ok } from "./evaluation/formulaError.ts";
import FormulaParser, { FormulaParseError } from "./parsing/formulaParser.ts";
import type { FormulaOptions } from "../main.types.ts";

export default class FormulaHandler {
  private options: FormulaOptions;

  constructor(options: FormulaOptions = {}) {
    this.options = {
      debug: false,
      ...options,
    };
  }

  parse(formula: string): EvaluationResult<FormulaNode> {
    try {
      return ok(FormulaParser.parse(formula));
    } catch (e) {
      if (!(e instanceof FormulaParseError)) throw e;

      if (this.options.debug) {
        console.log(`Invalid formula "${formula}": ${e.message}`);
      }
      return formulaError(FormulaErrorType.INVALID_EXPRESSION, e.message);
    }
  }

  evaluate(columns: readonly ColumnValue[], formula: string): EvaluationResult {
    const tree = this.parse(formula);
    if (!tree.ok) return tree;

    return this.evaluateTree(columns, tree.value);
  }

  /**
   * Evaluates an already parsed formula. Each call gets its own cache, so the
   * same tree can be evaluated against any number of rows.
   */
  evaluateTree(
    columns: readonly ColumnValue[],
    tree: FormulaNode,
  ): EvaluationResult {
    const cache = new ResultCache();
    const evaluator = new FormulaEvaluator(columns, cache, this.options);
    return evaluateTree(tree, evaluator, cache);
  }

  evaluateRows(
    rows: readonly (readonly ColumnValue[])[],
    formula: string,
  ): EvaluationResult[] {
    const tree = this.parse(formula);
    if (!tree.ok) return rows.map(() => tree);

    return rows.map((columns) => this.evaluateTree(columns, tree.value));
  }
}
