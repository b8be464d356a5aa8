import type { Atom, BigSMILES } from 'types';
import { sumBy } from 'es-toolkit';
import { BOND_ORDERS } from 'src/constants';
import { getBond } from 'src/utils/node-utils';

/**
 * Bonds used by an atom: bond orders plus explicit hydrogens.
 * Half-open ring closures do not count until their second end is seen.
 * Aromatic bonds count 1.5, rounded down over the atom so fused ring atoms fit.
 */
export function calculateValence(root: BigSMILES, atom: Atom): number {
  const bonds = atom.bonds.map(id => getBond(root, id)).filter(bond => bond.atom2 !== null);
  const bondOrderSum = sumBy(bonds, bond => BOND_ORDERS[bond.symbol]);
  return Math.floor(bondOrderSum) + (atom.hydrogens ?? 0);
}

export function bondCapacity(atom: Atom): number {
  return atom.valence + atom.charge;
}

export function bondsAvailable(root: BigSMILES, atom: Atom): number {
  return bondCapacity(atom) - calculateValence(root, atom);
}

export function implicitHydrogens(root: BigSMILES, atom: Atom): number {
  if (atom.hydrogens !== null) return 0;
  return Math.max(0, bondsAvailable(root, atom));
}

/**
 * Raise a default valence to the first allowed value that fits the current bonds.
 * Returns false when the atom is over capacity and no larger valence fits.
 */
export function increaseValence(root: BigSMILES, atom: Atom): boolean {
  if (!atom.defaultValence) return false;
  const used = calculateValence(root, atom);
  const valence = atom.possibleValences.find(v => v > atom.valence && v + atom.charge >= used);
  if (valence === undefined) return false;
  if (process.env.VERBOSE) {
    console.log(`[valence] ${atom.symbol}${atom.id}: ${atom.valence} -> ${valence}`);
  }
  atom.valence = valence;
  return true;
}
