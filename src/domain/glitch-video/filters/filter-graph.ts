import { formatDecimal } from '../../../shared/media/numberUtils.js';

import { type Expr, renderExpr } from './expression.js';

/** Strings are emitted verbatim; expressions are quoted so their commas survive the graph parser. */
export type FilterValue = number | string | Expr;

export interface Filter {
  readonly name: string;
  readonly positional: readonly FilterValue[];
  readonly options: readonly (readonly [string, FilterValue])[];
}

export interface FilterChain {
  readonly inputs: readonly string[];
  readonly filters: readonly Filter[];
  readonly outputs: readonly string[];
}

export function filter(
  name: string,
  positional: readonly FilterValue[] = [],
  options: Readonly<Record<string, FilterValue>> = {},
): Filter {
  return { name, positional, options: Object.entries(options) };
}

export function chain(inputs: readonly string[], filters: readonly Filter[], outputs: readonly string[]): FilterChain {
  if (filters.length === 0) {
    throw new Error('A filter chain needs at least one filter');
  }
  return { inputs, filters, outputs };
}

export function renderFilter(entry: Filter): string {
  const args = [
    ...entry.positional.map(renderValue),
    ...entry.options.map(([key, value]) => `${key}=${renderValue(value)}`),
  ];
  return args.length === 0 ? entry.name : `${entry.name}=${args.join(':')}`;
}

export function renderChain(entry: FilterChain): string {
  const inputs = entry.inputs.map((label) => `[${label}]`).join('');
  const outputs = entry.outputs.map((label) => `[${label}]`).join('');
  return `${inputs}${entry.filters.map(renderFilter).join(',')}${outputs}`;
}

export function renderGraph(chains: readonly FilterChain[]): string {
  return chains.map(renderChain).join(';');
}

function renderValue(value: FilterValue): string {
  if (typeof value === 'number') {
    return formatDecimal(value);
  }
  if (typeof value === 'string') {
    return value;
  }
  return `'${renderExpr(value)}'`;
}
