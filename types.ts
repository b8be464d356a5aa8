// Core types for BigSMILES parsing
import type { BigSMILESError } from 'src/errors';

export enum NodeKind {
  ROOT = 'root',
  ATOM = 'atom',
  BOND = 'bond',
  BOND_DESCRIPTOR_ATOM = 'bond-descriptor-atom',
  BRANCH = 'branch',
  STOCHASTIC_FRAGMENT = 'stochastic-fragment',
  STOCHASTIC_OBJECT = 'stochastic-object',
}

/**
 * Bond symbols as written in BigSMILES. '' is an implicit single bond,
 * ':' aromatic and '.' a zero-order disconnect.
 */
export type BondSymbol = '' | '-' | '=' | '#' | '$' | ':' | '.';

/** Bonding descriptor symbol; '' marks an implicit end group `[]`. */
export type DescriptorSymbol = '<' | '>' | '$' | '';

/**
 * Atom in a BigSMILES graph.
 * Every node refers to other nodes by id; `parent` is the id of the owning scope
 * (the root has id 0).
 */
export interface Atom {
  kind: NodeKind.ATOM;
  id: number;
  parent: number;
  symbol: string; // capitalized element symbol, e.g. 'C', 'Cl', 'Se'
  isotope: number | null;
  stereo: string | null; // '@' or '@@'
  hydrogens: number | null; // explicit hydrogens; null means implicit
  charge: number;
  valence: number;
  defaultValence: boolean; // true when valence may still be escalated
  possibleValences: readonly number[];
  aromatic: boolean;
  organic: boolean;
  atomClass: number | null;
  bonds: number[]; // bond ids
}

/**
 * Bond between two bondable nodes (Atom, BondDescriptorAtom or StochasticObject).
 * A ring closure keeps `atom2` null until its second ring index is seen.
 */
export interface Bond {
  kind: NodeKind.BOND;
  id: number;
  parent: number;
  symbol: BondSymbol;
  atom1: number;
  atom2: number | null;
  ringId: number | null;
}

/** Occurrence of a bonding descriptor inside a stochastic fragment. */
export interface BondDescriptorAtom {
  kind: NodeKind.BOND_DESCRIPTOR_ATOM;
  id: number;
  parent: number;
  descriptor: number; // BondDescriptor id
  bond: number | null;
}

export interface Branch {
  kind: NodeKind.BRANCH;
  id: number;
  parent: number;
  nodes: number[];
}

export interface StochasticFragment {
  kind: NodeKind.STOCHASTIC_FRAGMENT;
  id: number;
  parent: number;
  nodes: number[];
  rings: number[]; // ring bonds opened in this fragment
  bondingDescriptors: number[]; // distinct BondDescriptor ids used anywhere in the fragment
}

export interface StochasticObject {
  kind: NodeKind.STOCHASTIC_OBJECT;
  id: number;
  parent: number;
  nodes: number[]; // StochasticFragment ids
  bondingDescriptors: number[];
  bdLeft: number | null;
  bdRight: number | null;
  bondLeft: number | null;
  bondRight: number | null;
}

/**
 * Bonding descriptor scoped to one stochastic object. Not a node: it is never
 * part of a `nodes` sequence, its occurrences are BondDescriptorAtoms.
 */
export interface BondDescriptor {
  id: number;
  stochasticObject: number;
  descriptor: DescriptorSymbol;
  index: number;
  instances: number[]; // BondDescriptorAtom ids
  bondSymbol: BondSymbol | null; // symbol of an outer bond made through this descriptor as a boundary
}

export type Node = Atom | Bond | BondDescriptorAtom | Branch | StochasticFragment | StochasticObject;

/**
 * Top-level molecule. Owns the node registry and flat indexes of every atom,
 * bond and ring closure anywhere in the tree.
 */
export interface BigSMILES {
  kind: NodeKind.ROOT;
  id: number;
  nodes: number[];
  atoms: number[]; // Atom and BondDescriptorAtom ids
  bonds: number[];
  rings: number[]; // ring-closure bond ids, in creation order
  registry: Map<number, Node>;
  descriptors: Map<number, BondDescriptor>;
  nextId: number;
}

export type Scope = BigSMILES | Branch | StochasticFragment | StochasticObject;
export type RingScope = BigSMILES | StochasticFragment;
export type Bondable = Atom | BondDescriptorAtom | StochasticObject;
export type BondableKind = Bondable['kind'];

export interface GeneratorOptions {
  showAromaticBond: boolean; // ':' between aromatic atoms
  showBondDescriptorOneIndex: boolean; // '[$1]' instead of '[$]'
  showMultiBondsOnBothRingIndex: boolean; // 'C=1CCCCC=1' instead of 'C=1CCCCC1'
  showAtomClass: boolean; // '[CH3:1]'
}

export interface ParseResult {
  bigsmiles: BigSMILES | null; // null whenever errors is non-empty
  errors: BigSMILESError[];
  warnings: string[];
}
