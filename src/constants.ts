import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { sortBy } from 'es-toolkit';
import type { BondSymbol } from 'types';

export interface ElementData {
  symbol: string;
  atomicNumber: number;
  valences: number[];
  organic: boolean; // may be written without brackets
  aromatic: boolean; // has a lowercase aromatic form
}

function isElementData(value: unknown): value is ElementData {
  return (
    typeof value === 'object' &&
    value !== null &&
    'symbol' in value &&
    typeof value.symbol === 'string' &&
    'atomicNumber' in value &&
    typeof value.atomicNumber === 'number' &&
    'valences' in value &&
    Array.isArray(value.valences) &&
    value.valences.every((v: unknown) => typeof v === 'number') &&
    'organic' in value &&
    typeof value.organic === 'boolean' &&
    'aromatic' in value &&
    typeof value.aromatic === 'boolean'
  );
}

function loadElements(): readonly ElementData[] {
  const path = fileURLToPath(new URL('./data/elements.json', import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(raw) || !raw.every(isElementData)) {
    throw new Error(`Malformed element table: ${path}`);
  }
  return raw;
}

export const ELEMENTS: readonly ElementData[] = Object.freeze(loadElements());

export const DEFAULT_VALENCES: Readonly<Record<string, readonly number[]>> = Object.freeze(
  Object.fromEntries(ELEMENTS.map(e => [e.symbol, Object.freeze([...e.valences])])),
);

// Reverse-sorted so two-letter symbols are tried before their one-letter prefix (Cl before C).
export const ELEMENT_SYMBOLS: readonly string[] = sortBy(ELEMENTS.map(e => e.symbol), [s => s]).reverse();

export const ORGANIC_SYMBOLS: readonly string[] = ELEMENT_SYMBOLS.filter(s => ELEMENTS.some(e => e.symbol === s && e.organic));

export const AROMATIC_SYMBOLS: readonly string[] = ELEMENT_SYMBOLS
  .filter(s => ELEMENTS.some(e => e.symbol === s && e.aromatic))
  .map(s => s.toLowerCase());

export const BOND_ORDERS: Readonly<Record<BondSymbol, number>> = Object.freeze({
  '.': 0,
  '': 1,
  '-': 1,
  ':': 1.5,
  '=': 2,
  '#': 3,
  '$': 4,
});
