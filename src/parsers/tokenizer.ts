import { AROMATIC_SYMBOLS, ELEMENT_SYMBOLS, ORGANIC_SYMBOLS } from 'src/constants';
import { TokenizeError } from 'src/errors';
import type { DescriptorSymbol } from 'types';

export enum TokenKind {
  BOND = 'Bond',
  ATOM = 'Atom',
  AROMATIC = 'Aromatic',
  ATOM_EXTEND = 'AtomExtend',
  BRANCH_START = 'BranchStart',
  BRANCH_END = 'BranchEnd',
  RING = 'Ring',
  RING2 = 'Ring2',
  BOND_EZ = 'BondEZ',
  DISCONNECTED = 'Disconnected',
  BOND_DESCRIPTOR_LADDER = 'BondDescriptorLadder',
  BOND_DESCRIPTOR = 'BondDescriptor',
  STOCHASTIC_SEPARATOR = 'StochasticSeparator',
  STOCHASTIC_START = 'StochasticStart',
  STOCHASTIC_END = 'StochasticEnd',
  IMPLICIT_END_GROUP = 'ImplicitEndGroup',
  RXN = 'Rxn',
}

export interface Token {
  kind: TokenKind;
  value: string;
  position: number;
}

const BRACKET_ATOM = new RegExp(
  `\\[(\\d{1,3})?(${[...AROMATIC_SYMBOLS, ...ELEMENT_SYMBOLS].join('|')})(@{1,2})?(H\\d?)?([-+]{1,3}\\d?)?(?::(\\d{1,3}))?\\]`,
);

// Order matters: the first pattern matching at the current offset wins.
const TOKEN_PATTERNS: ReadonlyArray<readonly [TokenKind, RegExp]> = [
  [TokenKind.BOND, /[-=#$:]/y],
  [TokenKind.ATOM, new RegExp(ORGANIC_SYMBOLS.join('|'), 'y')],
  [TokenKind.AROMATIC, new RegExp(AROMATIC_SYMBOLS.join('|'), 'y')],
  [TokenKind.ATOM_EXTEND, new RegExp(BRACKET_ATOM.source, 'y')],
  [TokenKind.BRANCH_START, /\(/y],
  [TokenKind.BRANCH_END, /\)/y],
  [TokenKind.RING, /\d/y],
  [TokenKind.RING2, /%\d\d/y],
  [TokenKind.BOND_EZ, /[/\\]/y],
  [TokenKind.DISCONNECTED, /\./y],
  [TokenKind.BOND_DESCRIPTOR_LADDER, /\[[$<>]\d\[[$<>]\d?\]\d?\]/y],
  [TokenKind.BOND_DESCRIPTOR, /\[[$<>]\d?\d?\]/y],
  [TokenKind.STOCHASTIC_SEPARATOR, /[,;]/y],
  [TokenKind.STOCHASTIC_START, /\{/y],
  [TokenKind.STOCHASTIC_END, /\}/y],
  [TokenKind.IMPLICIT_END_GROUP, /\[\]/y],
  [TokenKind.RXN, />>|>/y],
];

const WHITESPACE = /[ \t]+/y;

function matchAt(pattern: RegExp, text: string, position: number): string | null {
  pattern.lastIndex = position;
  const match = pattern.exec(text);
  return match ? match[0] : null;
}

/**
 * Split a BigSMILES string into tokens. Spaces and tabs between tokens are ignored.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  outer: while (position < text.length) {
    const blank = matchAt(WHITESPACE, text, position);
    if (blank !== null) {
      position += blank.length;
      continue;
    }

    for (const [kind, pattern] of TOKEN_PATTERNS) {
      const value = matchAt(pattern, text, position);
      if (value !== null && value.length > 0) {
        tokens.push({ kind, value, position });
        position += value.length;
        continue outer;
      }
    }

    throw mismatchError(text, position);
  }

  if (process.env.VERBOSE) {
    console.log('[tokenizer]', tokens.map(t => `${t.kind}:${t.value}`).join(' '));
  }
  return tokens;
}

function mismatchError(text: string, position: number): TokenizeError {
  const rest = text.slice(position);
  const element = ELEMENT_SYMBOLS.find(symbol => rest.startsWith(symbol));
  if (element !== undefined && !ORGANIC_SYMBOLS.includes(element)) {
    return new TokenizeError(
      `Invalid symbol '${element}' at position ${position}. Elements outside of ${ORGANIC_SYMBOLS.join(', ')} must be in [].`,
      { position },
    );
  }
  return new TokenizeError(`Invalid symbol '${rest.slice(0, 10)}' at position ${position}.`, { position });
}

export interface AtomSymbol {
  element: string; // as written; lowercase when aromatic
  isotope: number | null;
  stereo: string | null;
  hydrogens: number | null;
  charge: number;
  atomClass: number | null;
}

/**
 * Decompose an atom token ('C', 'c', '[13CH2+:3]') into its parts.
 * A bare symbol has implicit hydrogens (null); a bracket atom without H has 0.
 */
export function tokenizeAtomSymbol(symbol: string): AtomSymbol {
  if (!symbol.startsWith('[')) {
    return { element: symbol, isotope: null, stereo: null, hydrogens: null, charge: 0, atomClass: null };
  }

  const match = BRACKET_ATOM.exec(symbol);
  if (!match || match[0] !== symbol) {
    throw new TokenizeError(`Invalid bracket atom: ${symbol}`);
  }
  const [, isotope, element, stereo, hydrogens, charge, atomClass] = match;
  if (element === undefined) {
    throw new TokenizeError(`Invalid bracket atom: ${symbol}`);
  }

  return {
    element,
    isotope: isotope !== undefined ? parseInt(isotope) : null,
    stereo: stereo ?? null,
    hydrogens: parseHydrogens(hydrogens),
    charge: parseCharge(charge),
    atomClass: atomClass !== undefined ? parseInt(atomClass) : null,
  };
}

function parseHydrogens(text: string | undefined): number {
  if (text === undefined) return 0;
  if (text === 'H') return 1;
  return parseInt(text.slice(1));
}

function parseCharge(text: string | undefined): number {
  if (text === undefined) return 0;
  const sign = text.startsWith('-') ? -1 : 1;
  const digits = text.replace(/[-+]/g, '');
  if (digits.length > 0) {
    return sign * parseInt(digits);
  }
  return sign * text.length;
}

function isDescriptorSymbol(value: string): value is DescriptorSymbol {
  return value === '' || value === '<' || value === '>' || value === '$';
}

/**
 * '[$1]' -> ['$', 1], '[<]' -> ['<', 1], '[]' -> ['', 1].
 */
export function tokenizeBondingDescriptor(symbol: string): [DescriptorSymbol, number] {
  const inner = symbol.replace(/^\[/, '').replace(/\]$/, '');
  const head = inner.charAt(0);
  if (!isDescriptorSymbol(head)) {
    throw new TokenizeError(`Invalid bonding descriptor: ${symbol}`);
  }
  const index = inner.slice(1);
  if (index === '') {
    return [head, 1];
  }
  if (!/^\d+$/.test(index)) {
    throw new TokenizeError(`Invalid bonding descriptor: ${symbol}`);
  }
  return [head, parseInt(index)];
}
