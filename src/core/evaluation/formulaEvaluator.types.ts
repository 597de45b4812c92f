import type { FormulaErrorType } from "./formulaError.ts";

export type ColumnValue = number | string | boolean;

// A range reference evaluates to every column it spans.
export type FormulaValue = ColumnValue | ColumnValue[];

export type EvaluationError = {
  ok: false;
  error: FormulaErrorType;
  message: string;
};

export type EvaluationResult<T = FormulaValue> =
  | { ok: true; value: T }
  | EvaluationError;

export type BinaryOperator = "+" | "-" | "*" | "/" | "^" | "%";

export type ComparisonOperator = "=" | "<>" | ">" | "<" | ">=" | "<=";

export type UnaryOperator = "+" | "-";

export type LiteralNode = {
  kind: "literal";
  value: ColumnValue;
};

export type CellNode = {
  kind: "cell";
  key: string;
};

export type CellRangeNode = {
  kind: "cell-range";
  start: CellNode;
  end: CellNode;
};

export type BinaryNode = {
  kind: "binary";
  operator: BinaryOperator;
  left: FormulaNode;
  right: FormulaNode;
};

export type ComparisonNode = {
  kind: "comparison";
  operator: ComparisonOperator;
  left: FormulaNode;
  right: FormulaNode;
};

export type UnaryNode = {
  kind: "unary";
  operator: UnaryOperator;
  operand: FormulaNode;
};

export type FunctionNode = {
  kind: "function";
  name: string;
  arguments: FormulaNode[];
};

export type FormulaNode =
  | LiteralNode
  | CellNode
  | CellRangeNode
  | BinaryNode
  | ComparisonNode
  | UnaryNode
  | FunctionNode;
