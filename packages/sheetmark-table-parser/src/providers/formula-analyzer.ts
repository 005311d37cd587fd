import type { FormulaCategory } from './types';

const AGGREGATE_FUNCTIONS = new Set(['SUM', 'AVERAGE', 'COUNT', 'COUNTA', 'MAX', 'MIN', 'MEDIAN']);
const PERCENTAGE_FUNCTIONS = new Set(['PERCENTAGE', 'PERCENTRANK']);
const LOGICAL_FUNCTIONS = new Set(['IF', 'AND', 'OR', 'NOT', 'IFERROR']);
const LOOKUP_FUNCTIONS = new Set(['VLOOKUP', 'HLOOKUP', 'INDEX', 'MATCH', 'XLOOKUP']);

const STRING_LITERAL = /"(?:[^"]|"")*"/g;
const FUNCTION_CALL = /\b([A-Z][A-Z0-9.]*)\s*\(/gi;
const CELL_REFERENCE = /(?:(?:'[^']+'|[A-Za-z_][\w.]*)!)?\$?[A-Z]{1,3}\$?\d+(?::\$?[A-Z]{1,3}\$?\d+)?/g;
const ARITHMETIC_OPERATOR = /[+\-*/^]/;

export interface FormulaAnalysis {
  category: FormulaCategory;
  functions: string[];
  references: string[];
  description: string;
}

/**
 * Classify a formula by the functions and operators it uses. The first
 * matching category wins: aggregate, percentage, logical, lookup,
 * arithmetic, other.
 */
export function analyzeFormula(formula: string): FormulaAnalysis {
  const body = formula.replace(/^=/, '').replace(STRING_LITERAL, '""');

  const functions = unique([...body.matchAll(FUNCTION_CALL)].map((m) => m[1].toUpperCase()));
  const references = unique(body.replace(FUNCTION_CALL, '(').match(CELL_REFERENCE) ?? []);
  const category = categorize(body, functions);

  return { category, functions, references, description: describe(category, functions, references) };
}

function categorize(body: string, functions: string[]): FormulaCategory {
  if (functions.some((fn) => AGGREGATE_FUNCTIONS.has(fn))) return 'aggregate';
  if (body.includes('%') || functions.some((fn) => PERCENTAGE_FUNCTIONS.has(fn))) return 'percentage';
  if (functions.some((fn) => LOGICAL_FUNCTIONS.has(fn))) return 'logical';
  if (functions.some((fn) => LOOKUP_FUNCTIONS.has(fn))) return 'lookup';
  if (ARITHMETIC_OPERATOR.test(body)) return 'arithmetic';
  return 'other';
}

function describe(category: FormulaCategory, functions: string[], references: string[]): string {
  const using = functions.length > 0 ? functions.join(', ') : 'operators';
  const over = references.length > 0 ? ` over ${references.join(', ')}` : '';
  return `${category} formula using ${using}${over}`;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
