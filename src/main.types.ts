export type FormulaOptions = {
  // Log rejected formulas and unknown function names to the console.
  debug?: boolean;
};
