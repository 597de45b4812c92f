// Column reference: "c" or "C" followed by a 1-based column number.
export const CELL_KEY_EXPRESSION = /^[cC](\d+)/;

export const ErrorMessages = {
  invalidReference: "invalid reference",
  columnOutOfRange: "column index out of range",
  notImplemented: "not implemented",
  atLeastOneArgument: "requires at least 1 argument",
  twoArguments: "requires 2 arguments",
  threeArguments: "requires 3 arguments",
  tooManyNumbers: "too many arguments or not numbers",
  notANumber: "too many arguments or not a number",
} as const;
