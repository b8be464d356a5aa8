import type { Atom } from 'types';
import { NodeKind } from 'types';
import { AROMATIC_SYMBOLS, DEFAULT_VALENCES, ORGANIC_SYMBOLS } from 'src/constants';
import { ConstructorError } from 'src/errors';
import type { AtomSymbol } from 'src/parsers/tokenizer';

/**
 * Check if a symbol may be written without brackets
 */
export function isOrganicAtom(symbol: string): boolean {
  return ORGANIC_SYMBOLS.includes(symbol);
}

export function isAromaticSymbol(symbol: string): boolean {
  return AROMATIC_SYMBOLS.includes(symbol);
}

/**
 * Create a new, unbonded atom from a tokenized atom symbol
 */
export function createAtom(parts: AtomSymbol, id: number, parent: number): Atom {
  const aromatic = isAromaticSymbol(parts.element);
  const symbol = parts.element.charAt(0).toUpperCase() + parts.element.slice(1);
  const possibleValences = DEFAULT_VALENCES[symbol];
  if (possibleValences === undefined || possibleValences.length === 0) {
    throw new ConstructorError(`Unknown element: ${parts.element}`);
  }
  return {
    kind: NodeKind.ATOM,
    id,
    parent,
    symbol,
    isotope: parts.isotope,
    stereo: parts.stereo,
    hydrogens: parts.hydrogens,
    charge: parts.charge,
    valence: possibleValences[0] ?? 0,
    defaultValence: true,
    possibleValences,
    aromatic,
    organic: isOrganicAtom(symbol),
    atomClass: parts.atomClass,
    bonds: [],
  };
}
