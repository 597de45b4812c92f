import type {
  EvaluationResult,
  FormulaNode,
} from "./formulaEvaluator.types.ts";
import type FormulaEvaluator from "./formulaEvaluator.ts";
import type ResultCache from "./resultCache.ts";
import { ok } from "./formulaError.ts";

/**
 * Walks the tree children first and records every node's result in the
 * cache. Every function argument is evaluated, including the branch IF does
 * not take.
 */
export function evaluateTree(
  root: FormulaNode,
  evaluator: FormulaEvaluator,
  cache: ResultCache,
): EvaluationResult {
  visit(root, evaluator, cache);
  return cache.get(root);
}

function visit(
  node: FormulaNode,
  evaluator: FormulaEvaluator,
  cache: ResultCache,
): void {
  // Shared subtrees are evaluated once.
  if (cache.has(node)) return;

  switch (node.kind) {
    case "literal":
      cache.set(node, ok(node.value));
      return;

    case "cell":
      cache.set(node, evaluator.resolveColumnValue(node.key));
      return;

    case "cell-range":
      cache.set(node, evaluator.resolveRange(node.start.key, node.end.key));
      return;

    case "binary":
      visit(node.left, evaluator, cache);
      visit(node.right, evaluator, cache);
      cache.set(
        node,
        evaluator.evalBinary(
          node.operator,
          cache.get(node.left),
          cache.get(node.right),
        ),
      );
      return;

    case "comparison":
      visit(node.left, evaluator, cache);
      visit(node.right, evaluator, cache);
      cache.set(
        node,
        evaluator.evalComparison(
          node.operator,
          cache.get(node.left),
          cache.get(node.right),
        ),
      );
      return;

    case "unary":
      visit(node.operand, evaluator, cache);
      cache.set(
        node,
        evaluator.evalUnary(node.operator, cache.get(node.operand)),
      );
      return;

    case "function":
      for (const arg of node.arguments) {
        visit(arg, evaluator, cache);
      }
      cache.set(node, evaluator.evalFunction(node.name, node.arguments));
      return;
  }
}
