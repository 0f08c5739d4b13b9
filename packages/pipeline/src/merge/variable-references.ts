/**
 * Variable reference analysis
 *
 * A variable value may embed other variables as `${NAME}`, `${NAME:-fallback}`
 * or `$NAME`; `$$` escapes a literal dollar. A chain of such references
 * that returns to where it started cannot be expanded by the CI and is
 * rejected before anything is emitted.
 */

import { CircularVariableError } from "../errors/index.js";
import { buildAdjacencyList, detectCycle } from "../graph/index.js";
import type { VariableValue, Variables } from "../schemas/index.js";

const NAME_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;
const OPERATOR_PATTERN = /^:?[-=?+]/;

function nameAt(text: string, index: number): string | undefined {
  NAME_PATTERN.lastIndex = index;
  return NAME_PATTERN.exec(text)?.[0];
}

/**
 * Index of the `}` closing the brace at `open`, or -1
 */
function closingBrace(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === "{") depth++;
    else if (text[i] === "}" && --depth === 0) return i;
  }
  return -1;
}

/**
 * Collect references in `text`, descending into `${NAME:-fallback}` bodies
 */
function scanReferences(text: string, names: string[]): void {
  let i = 0;
  while (i < text.length) {
    if (text[i] !== "$") {
      i++;
      continue;
    }

    const next = text[i + 1];
    if (next === "$") {
      i += 2;
      continue;
    }

    if (next === "{") {
      const name = nameAt(text, i + 2);
      if (name === undefined) {
        i += 2;
        continue;
      }
      if (!names.includes(name)) names.push(name);

      const close = closingBrace(text, i + 1);
      const end = close === -1 ? text.length : close;
      const rest = text.slice(i + 2 + name.length, end);
      const operator = OPERATOR_PATTERN.exec(rest);
      if (operator) {
        scanReferences(rest.slice(operator[0].length), names);
      }
      i = end + 1;
      continue;
    }

    const name = nameAt(text, i + 1);
    if (name === undefined) {
      i++;
      continue;
    }
    if (!names.includes(name)) names.push(name);
    i += 1 + name.length;
  }
}

/**
 * Names referenced by a value, in order of first appearance
 */
export function extractReferences(value: VariableValue): string[] {
  let text: string;
  if (typeof value === "string") {
    text = value;
  } else if (typeof value === "object") {
    if (value.expand === false) {
      return [];
    }
    text = value.value;
  } else {
    return [];
  }

  const names: string[] = [];
  scanReferences(text, names);
  return names;
}

/**
 * Minimal reference cycle among the defined variables, or null
 *
 * References to names not defined in `variables` (CI-provided variables)
 * are not edges.
 */
export function findVariableCycle(variables: Variables): string[] | null {
  const names = Object.keys(variables);
  const defined = new Set(names);
  const edges: Array<[string, string]> = [];

  for (const [name, value] of Object.entries(variables)) {
    for (const reference of extractReferences(value)) {
      if (defined.has(reference)) {
        edges.push([name, reference]);
      }
    }
  }

  return detectCycle(buildAdjacencyList(names, edges));
}

/**
 * @throws {CircularVariableError} Some variable transitively references itself
 */
export function assertNoCircularVariables(variables: Variables): void {
  const cycle = findVariableCycle(variables);
  if (cycle) {
    throw new CircularVariableError(cycle);
  }
}
