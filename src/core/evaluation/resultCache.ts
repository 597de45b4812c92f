import type {
  EvaluationResult,
  FormulaNode,
} from "./formulaEvaluator.types.ts";

/**
 * Results of already evaluated nodes, keyed by node identity.
 * One cache lives for exactly one evaluation pass.
 */
export default class ResultCache {
  private results: Map<FormulaNode, EvaluationResult>;

  constructor() {
    this.results = new Map<FormulaNode, EvaluationResult>();
  }

  get size(): number {
    return this.results.size;
  }

  has(node: FormulaNode): boolean {
    return this.results.has(node);
  }

  /**
   * Children are always evaluated before their parent, so a miss means the
   * traversal order was broken.
   */
  get(node: FormulaNode): EvaluationResult {
    const result = this.results.get(node);
    if (!result) {
      throw new Error(`No result recorded for ${node.kind} node`);
    }
    return result;
  }

  set(node: FormulaNode, result: EvaluationResult): void {
    if (this.results.has(node)) {
      throw new Error(`Result for ${node.kind} node is already recorded`);
    }
    this.results.set(node, result);
  }

  values(): IterableIterator<EvaluationResult> {
    return this.results.values();
  }
}
