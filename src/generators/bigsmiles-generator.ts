import type { Atom, BigSMILES, Bond, BondDescriptor, GeneratorOptions, Node, StochasticObject } from 'types';
import { NodeKind } from 'types';
import { sortBy } from 'es-toolkit';
import {
  containsStochasticObject,
  getBond,
  getDescriptor,
  getNode,
} from 'src/utils/node-utils';

export const DEFAULT_GENERATOR_OPTIONS: Readonly<GeneratorOptions> = Object.freeze({
  showAromaticBond: false,
  showBondDescriptorOneIndex: false,
  showMultiBondsOnBothRingIndex: false,
  showAtomClass: true,
});

interface GeneratorContext {
  root: BigSMILES;
  options: Readonly<GeneratorOptions>;
  stochastic: boolean; // ring bond symbols are written on both ring ends
}

export function generateBigSMILES(root: BigSMILES, options: Partial<GeneratorOptions> = {}): string {
  return generateNodes(root, root.nodes, options);
}

/**
 * Write a run of nodes belonging to `root`. Used to cut a molecule into
 * its disconnected parts.
 */
export function generateNodes(root: BigSMILES, ids: readonly number[], options: Partial<GeneratorOptions> = {}): string {
  const ctx: GeneratorContext = {
    root,
    options: { ...DEFAULT_GENERATOR_OPTIONS, ...options },
    stochastic: containsStochasticObject(root),
  };
  return ids.map(id => nodeToString(ctx, getNode(root, id))).join('');
}

function nodeToString(ctx: GeneratorContext, node: Node): string {
  switch (node.kind) {
    case NodeKind.ATOM:
      return atomToString(ctx, node);
    case NodeKind.BOND:
      return bondSymbolToString(ctx, node);
    case NodeKind.BOND_DESCRIPTOR_ATOM:
      return descriptorToString(ctx, getDescriptor(ctx.root, node.descriptor));
    case NodeKind.BRANCH:
      return '(' + node.nodes.map(id => nodeToString(ctx, getNode(ctx.root, id))).join('') + ')';
    case NodeKind.STOCHASTIC_FRAGMENT:
      return node.nodes.map(id => nodeToString(ctx, getNode(ctx.root, id))).join('');
    case NodeKind.STOCHASTIC_OBJECT:
      return stochasticObjectToString(ctx, node);
  }
}

function bondSymbolToString(ctx: GeneratorContext, bond: Bond): string {
  if (bond.symbol === ':' && !ctx.options.showAromaticBond) return '';
  return bond.symbol;
}

function ringIdToString(ringId: number): string {
  return ringId > 9 ? `%${ringId}` : `${ringId}`;
}

function atomToString(ctx: GeneratorContext, atom: Atom): string {
  let bracket = atom.symbol === 'H';
  let text = '';

  if (atom.isotope !== null) {
    text += atom.isotope;
    bracket = true;
  }
  text += atom.aromatic ? atom.symbol.toLowerCase() : atom.symbol;
  if (atom.stereo !== null) {
    text += atom.stereo;
    bracket = true;
  }
  if (atom.hydrogens !== null) {
    if (atom.hydrogens === 1) text += 'H';
    else if (atom.hydrogens > 1) text += `H${atom.hydrogens}`;
    bracket = true;
  }
  if (atom.charge !== 0) {
    const magnitude = Math.abs(atom.charge);
    text += (atom.charge > 0 ? '+' : '-') + (magnitude > 1 ? magnitude : '');
    bracket = true;
  }
  if (atom.atomClass !== null && ctx.options.showAtomClass) {
    text += `:${atom.atomClass}`;
    bracket = true;
  }
  if (bracket) text = `[${text}]`;

  const rings = sortBy(
    atom.bonds.map(id => getBond(ctx.root, id)).filter(bond => bond.ringId !== null),
    [bond => bond.ringId],
  );
  for (const ring of rings) {
    text += ringBondToString(ctx, ring, atom.id === ring.atom2);
  }
  return text;
}

function ringBondToString(ctx: GeneratorContext, ring: Bond, closing: boolean): string {
  let text = '';
  if (ring.symbol !== ':') {
    const bothEnds = ctx.stochastic || ctx.options.showMultiBondsOnBothRingIndex;
    if (!closing || bothEnds) text += ring.symbol;
  }
  return text + ringIdToString(ring.ringId ?? 0);
}

function descriptorToString(ctx: GeneratorContext, descriptor: BondDescriptor): string {
  if (descriptor.descriptor === '') return '[]';
  const index = descriptor.index === 1 && !ctx.options.showBondDescriptorOneIndex ? '' : `${descriptor.index}`;
  return `[${descriptor.descriptor}${index}]`;
}

function stochasticObjectToString(ctx: GeneratorContext, object: StochasticObject): string {
  const left = object.bdLeft !== null ? descriptorToString(ctx, getDescriptor(ctx.root, object.bdLeft)) : '';
  const right = object.bdRight !== null ? descriptorToString(ctx, getDescriptor(ctx.root, object.bdRight)) : '';
  const fragments = object.nodes.map(id => nodeToString(ctx, getNode(ctx.root, id))).join(',');
  let text = `{${left}${fragments}${right}}`;
  if (object.bondRight !== null) {
    const bond = getBond(ctx.root, object.bondRight);
    if (bond.ringId !== null) {
      text += ringBondToString(ctx, bond, false);
    }
  }
  return text;
}
