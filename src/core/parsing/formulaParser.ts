import {
  create,
  parseDependencies,
  SymbolNodeDependencies,
  FunctionNodeDependencies,
  type MathNode,
} from "mathjs/number";

import type {
  CellNode,
  FormulaNode,
} from "../evaluation/formulaEvaluator.types.ts";
import FormulaHelper from "../../utils/helpers.ts";

const math = create({
  parseDependencies,
  SymbolNodeDependencies,
  FunctionNodeDependencies,
});

// mathjs operator spelling to spreadsheet operator spelling.
const SPREADSHEET_OPERATORS = new Map<string, string>([
  ["mod", "%"],
  ["==", "="],
  ["!=", "<>"],
]);

export class FormulaParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormulaParseError";
  }
}

/**
 * Turns formula text such as `=IF(c1>=10, c2*2, c3)` into a {@link FormulaNode}
 * tree, using the mathjs expression parser for the syntax.
 */
export default class FormulaParser {
  static parse(formula: string): FormulaNode {
    const expression = formula.trimStart().startsWith("=")
      ? formula.trimStart().substring(1)
      : formula;

    let parsed: MathNode;
    try {
      parsed = math.parse(FormulaParser.normalizeOperators(expression));
    } catch (e) {
      throw new FormulaParseError(
        `Invalid expression: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
    return FormulaParser.convert(parsed);
  }

  /**
   * Rewrites spreadsheet comparison operators into the ones mathjs reads:
   * a lone `=` becomes `==` and `<>` becomes `!=`. String literals are kept
   * as they are.
   */
  static normalizeOperators(expression: string): string {
    let normalized = "";
    let quote: string | null = null;

    for (let i = 0; i < expression.length; i++) {
      const c = expression[i];

      if (quote !== null) {
        normalized += c;
        if (c === "\\" && i + 1 < expression.length) {
          normalized += expression[i + 1];
          i++;
        } else if (c === quote) {
          quote = null;
        }
        continue;
      }

      if (c === '"' || c === "'") {
        quote = c;
        normalized += c;
        continue;
      }

      if (c === "<" && expression[i + 1] === ">") {
        normalized += "!=";
        i++;
        continue;
      }

      if (c === "=") {
        const prev = expression[i - 1];
        const next = expression[i + 1];
        if (!["<", ">", "!", "="].includes(prev) && next !== "=") {
          normalized += "==";
          continue;
        }
      }

      normalized += c;
    }
    return normalized;
  }

  private static convert(node: MathNode): FormulaNode {
    if (node instanceof math.ParenthesisNode) {
      return FormulaParser.convert(node.content);
    }

    if (node instanceof math.ConstantNode) {
      const value: unknown = node.value;
      if (
        typeof value === "number" ||
        typeof value === "string" ||
        typeof value === "boolean"
      ) {
        return { kind: "literal", value };
      }
      throw new FormulaParseError(`Unsupported constant: ${String(value)}`);
    }

    if (node instanceof math.SymbolNode) {
      // Spreadsheet spelling of the boolean constants.
      const name = node.name.toUpperCase();
      if (name === "TRUE" || name === "FALSE") {
        return { kind: "literal", value: name === "TRUE" };
      }
      return FormulaParser.toCell(node);
    }

    if (node instanceof math.RangeNode) {
      if (node.step) {
        throw new FormulaParseError(`Invalid range: ${node.toString()}`);
      }
      return {
        kind: "cell-range",
        start: FormulaParser.toCell(node.start),
        end: FormulaParser.toCell(node.end),
      };
    }

    if (FormulaParser.isPowerChain(node)) {
      const [base, ...exponents] = FormulaParser.powerOperands(node);
      return exponents.reduce<FormulaNode>(
        (left, right) => ({ kind: "binary", operator: "^", left, right }),
        base,
      );
    }

    if (node instanceof math.OperatorNode) {
      if (node.implicit) {
        throw new FormulaParseError(
          `Implicit multiplication is not supported: ${node.toString()}`,
        );
      }

      const op: string = SPREADSHEET_OPERATORS.get(node.op) ?? node.op;
      const args: MathNode[] = node.args;

      if (args.length === 1 && FormulaHelper.isUnaryOperator(op)) {
        return {
          kind: "unary",
          operator: op,
          operand: FormulaParser.convert(args[0]),
        };
      }

      if (args.length === 2 && FormulaHelper.isBinaryOperator(op)) {
        return {
          kind: "binary",
          operator: op,
          left: FormulaParser.convert(args[0]),
          right: FormulaParser.convert(args[1]),
        };
      }

      if (args.length === 2 && FormulaHelper.isComparisonOperator(op)) {
        return {
          kind: "comparison",
          operator: op,
          left: FormulaParser.convert(args[0]),
          right: FormulaParser.convert(args[1]),
        };
      }

      throw new FormulaParseError(`Unsupported operator: ${op}`);
    }

    if (node instanceof math.FunctionNode) {
      const callee: MathNode = node.fn;
      if (!(callee instanceof math.SymbolNode)) {
        throw new FormulaParseError(`Invalid function: ${node.toString()}`);
      }
      const args: MathNode[] = node.args;
      return {
        kind: "function",
        name: callee.name,
        arguments: args.map((arg) => FormulaParser.convert(arg)),
      };
    }

    throw new FormulaParseError(`Unsupported expression: ${node.toString()}`);
  }

  /**
   * `^` chains and signed `^` chains, which need spreadsheet precedence:
   * a leading sign binds to the base and `^` groups left to right.
   */
  private static isPowerChain(node: MathNode): boolean {
    if (!(node instanceof math.OperatorNode)) return false;

    const args: MathNode[] = node.args;
    if (args.length === 2) return node.op === "^";
    return (
      args.length === 1 &&
      FormulaHelper.isUnaryOperator(node.op) &&
      FormulaParser.isPowerChain(args[0])
    );
  }

  // Flattens `a^(b^c)` as mathjs nests it into [a, b, c].
  private static powerOperands(node: MathNode): FormulaNode[] {
    if (
      !(node instanceof math.OperatorNode) ||
      !FormulaParser.isPowerChain(node)
    ) {
      return [FormulaParser.convert(node)];
    }

    const args: MathNode[] = node.args;
    const op: string = node.op;
    if (args.length === 2) {
      return [
        FormulaParser.convert(args[0]),
        ...FormulaParser.powerOperands(args[1]),
      ];
    }

    if (!FormulaHelper.isUnaryOperator(op)) {
      throw new FormulaParseError(`Unsupported operator: ${op}`);
    }
    const [base, ...exponents] = FormulaParser.powerOperands(args[0]);
    return [{ kind: "unary", operator: op, operand: base }, ...exponents];
  }

  private static toCell(node: MathNode): CellNode {
    if (!(node instanceof math.SymbolNode)) {
      throw new FormulaParseError(`Invalid reference: ${node.toString()}`);
    }
    return { kind: "cell", key: node.name };
  }
}
