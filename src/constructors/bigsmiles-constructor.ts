import type {
  Atom,
  BigSMILES,
  Bond,
  Bondable,
  BondDescriptor,
  BondDescriptorAtom,
  BondSymbol,
  Branch,
  DescriptorSymbol,
  Scope,
  StochasticFragment,
  StochasticObject,
} from 'types';
import { NodeKind } from 'types';
import { last, maxBy, uniq } from 'es-toolkit';
import { BOND_ORDERS } from 'src/constants';
import { ConstructorError } from 'src/errors';
import { tokenizeAtomSymbol, type AtomSymbol } from 'src/parsers/tokenizer';
import { createAtom } from 'src/utils/atom-utils';
import {
  createBigSMILES,
  descriptorBondSymbols,
  getBond,
  getBondable,
  getBondIds,
  getDescriptor,
  getEnclosingStochasticObject,
  getNode,
  getPrior,
  getRingScope,
  getScope,
  isAromatic,
  nextId,
  register,
} from 'src/utils/node-utils';
import { bondsAvailable, increaseValence } from 'src/utils/valence-calculator';
import { removeUnnecessaryBranches, renumberRings } from 'src/utils/syntax-fixes';

const BONDABLE_KINDS = [NodeKind.ATOM, NodeKind.BOND_DESCRIPTOR_ATOM, NodeKind.STOCHASTIC_OBJECT] as const;
const RING_END_KINDS = [NodeKind.ATOM, NodeKind.STOCHASTIC_OBJECT] as const;

const SCOPE_NAMES: Record<Scope['kind'], string> = {
  [NodeKind.ROOT]: 'BigSMILES',
  [NodeKind.BRANCH]: 'Branch',
  [NodeKind.STOCHASTIC_FRAGMENT]: 'StochasticFragment',
  [NodeKind.STOCHASTIC_OBJECT]: 'StochasticObject',
};

const BOND_SYMBOLS: readonly BondSymbol[] = ['.', '', '-', ':', '=', '#', '$'];

export function bondSymbolForOrder(order: number): BondSymbol {
  const symbol = BOND_SYMBOLS.find(s => BOND_ORDERS[s] === order);
  if (symbol === undefined) {
    throw new ConstructorError(`No bond symbol for bond order ${order}.`);
  }
  return symbol;
}

/**
 * Builds a BigSMILES graph one operation at a time. Keeps a stack of open
 * scopes with the root at the bottom; every operation acts on the top scope.
 */
export class BigSMILESConstructor {
  readonly root: BigSMILES = createBigSMILES();
  readonly warnings: string[] = [];
  private readonly stack: Scope[] = [this.root];

  get current(): Scope {
    return last(this.stack) ?? this.root;
  }

  addAtom(parts: AtomSymbol): Atom {
    const scope = this.current;
    const atom = register(this.root, createAtom(parts, nextId(this.root), scope.id));
    scope.nodes.push(atom.id);
    this.root.atoms.push(atom.id);
    return atom;
  }

  addBondAtomPair(bondSymbol: BondSymbol, parts: AtomSymbol): Atom {
    const scope = this.current;
    const atom = register(this.root, createAtom(parts, nextId(this.root), scope.id));
    const prior = getPrior(this.root, scope, BONDABLE_KINDS);
    this.addBond(scope, bondSymbol, prior, atom);
    scope.nodes.push(atom.id);
    this.root.atoms.push(atom.id);
    return atom;
  }

  addBondingDescriptor(descriptor: DescriptorSymbol, index: number): BondDescriptorAtom {
    const scope = this.current;
    const object = this.requireStochasticObject(scope);
    const bd = this.getOrCreateDescriptor(object, descriptor, index, null);
    const bdAtom = this.createBondDescriptorAtom(scope, bd);
    scope.nodes.push(bdAtom.id);
    this.root.atoms.push(bdAtom.id);
    return bdAtom;
  }

  addBondBondingDescriptorPair(bondSymbol: BondSymbol, descriptor: DescriptorSymbol, index: number): BondDescriptorAtom {
    const scope = this.current;
    const object = this.requireStochasticObject(scope);
    const bd = this.getOrCreateDescriptor(object, descriptor, index, null);
    const bdAtom = this.createBondDescriptorAtom(scope, bd);
    const prior = getPrior(this.root, scope, BONDABLE_KINDS);
    this.addBond(scope, bondSymbol, prior, bdAtom);
    scope.nodes.push(bdAtom.id);
    this.root.atoms.push(bdAtom.id);
    return bdAtom;
  }

  openBranch(): Branch {
    const scope = this.current;
    if (scope.nodes.length === 0 && (scope.kind === NodeKind.BRANCH || scope.kind === NodeKind.ROOT)) {
      throw new ConstructorError(`${SCOPE_NAMES[scope.kind]} can't start with a branch.`);
    }
    const branch = register<Branch>(this.root, {
      kind: NodeKind.BRANCH,
      id: nextId(this.root),
      parent: scope.id,
      nodes: [],
    });
    scope.nodes.push(branch.id);
    this.stack.push(branch);
    return branch;
  }

  closeBranch(): void {
    const branch = this.current;
    if (branch.kind !== NodeKind.BRANCH) {
      throw new ConstructorError(`Error closing branch. Current scope is a ${SCOPE_NAMES[branch.kind]}.`);
    }
    this.stack.pop();
    if (branch.nodes.length === 0) {
      const parent = getScope(this.root, branch.parent);
      parent.nodes = parent.nodes.filter(id => id !== branch.id);
      this.root.registry.delete(branch.id);
    }
  }

  /**
   * Open or close ring `ringId` at the prior atom. Closing a ring between two
   * atoms that are already bonded merges it into that bond.
   */
  addRing(ringId: number, bondSymbol: BondSymbol = ''): Bond {
    const scope = this.current;
    const ringScope = getRingScope(this.root, scope);
    const prior = getPrior(this.root, scope, RING_END_KINDS);
    const open = this.root.rings
      .map(id => getBond(this.root, id))
      .find(ring => ring.ringId === ringId && ring.parent === ringScope.id);

    if (!open) {
      const ring = register<Bond>(this.root, {
        kind: NodeKind.BOND,
        id: nextId(this.root),
        parent: ringScope.id,
        symbol: bondSymbol,
        atom1: prior.id,
        atom2: null,
        ringId,
      });
      this.root.bonds.push(ring.id);
      this.root.rings.push(ring.id);
      if (ringScope.kind === NodeKind.STOCHASTIC_FRAGMENT) ringScope.rings.push(ring.id);
      return ring;
    }

    if (open.atom2 !== null) {
      throw new ConstructorError(`Ring already formed for ring id ${ringId}.`);
    }
    if (open.atom1 === prior.id) {
      throw new ConstructorError(`Ring ${ringId} can't bond an atom to itself.`);
    }
    const atom1 = getBondable(this.root, open.atom1);
    const common = this.getCommonBond(atom1, prior);
    if (common) {
      if (common.symbol === ':' || bondSymbol === ':') {
        throw new ConstructorError(`Ring ${ringId} can't be merged into an aromatic bond.`);
      }
      this.warn('Duplicate ring detected and merged into one with a higher bond order.');
      common.symbol = bondSymbolForOrder(BOND_ORDERS[common.symbol] + BOND_ORDERS[bondSymbol]);
      this.removeRing(open, ringScope);
      this.checkValence(atom1);
      this.checkValence(prior);
      return common;
    }

    open.atom2 = prior.id;
    if (BOND_ORDERS[bondSymbol] > BOND_ORDERS[open.symbol]) {
      open.symbol = bondSymbol;
    }
    if (isAromatic(this.root, atom1) && isAromatic(this.root, prior)) {
      open.symbol = ':';
    }
    this.connect(open);
    return open;
  }

  openStochasticObject(descriptor: DescriptorSymbol, index: number): StochasticObject {
    const scope = this.current;
    const object = this.createStochasticObject(scope);
    object.bdLeft = this.getOrCreateDescriptor(object, descriptor, index, null).id;
    scope.nodes.push(object.id);
    this.stack.push(object);
    this.openStochasticFragment();
    return object;
  }

  openStochasticObjectWithBond(bondSymbol: BondSymbol, descriptor: DescriptorSymbol, index: number): StochasticObject {
    const scope = this.current;
    const object = this.createStochasticObject(scope);
    object.bdLeft = this.getOrCreateDescriptor(object, descriptor, index, bondSymbol === '.' ? null : bondSymbol).id;
    const prior = getPrior(this.root, scope, RING_END_KINDS);
    this.addBond(scope, bondSymbol, prior, object);
    scope.nodes.push(object.id);
    this.stack.push(object);
    this.openStochasticFragment();
    return object;
  }

  closeStochasticObject(descriptor: DescriptorSymbol, index: number): StochasticObject {
    const object = this.current;
    if (object.kind !== NodeKind.STOCHASTIC_OBJECT) {
      throw new ConstructorError(`Error closing stochastic object. Current scope is a ${SCOPE_NAMES[object.kind]}.`);
    }
    object.bdRight = this.getOrCreateDescriptor(object, descriptor, index, null).id;
    this.stack.pop();
    return object;
  }

  openStochasticFragment(): StochasticFragment {
    const object = this.current;
    if (object.kind !== NodeKind.STOCHASTIC_OBJECT) {
      throw new ConstructorError(`Stochastic fragments must be inside a stochastic object, not a ${SCOPE_NAMES[object.kind]}.`);
    }
    const fragment = register<StochasticFragment>(this.root, {
      kind: NodeKind.STOCHASTIC_FRAGMENT,
      id: nextId(this.root),
      parent: object.id,
      nodes: [],
      rings: [],
      bondingDescriptors: [],
    });
    object.nodes.push(fragment.id);
    this.stack.push(fragment);
    return fragment;
  }

  closeStochasticFragment(): StochasticFragment {
    const fragment = this.current;
    if (fragment.kind !== NodeKind.STOCHASTIC_FRAGMENT) {
      throw new ConstructorError(`Error closing stochastic fragment. Current scope is a ${SCOPE_NAMES[fragment.kind]}.`);
    }
    fragment.bondingDescriptors = uniq(this.collectDescriptors(fragment));
    if (fragment.bondingDescriptors.length === 0) {
      throw new ConstructorError('No bonding descriptor in the stochastic fragment.');
    }
    this.stack.pop();
    return fragment;
  }

  closeOpenStochasticFragment(): StochasticFragment {
    this.closeStochasticFragment();
    return this.openStochasticFragment();
  }

  /**
   * End construction: every scope must be closed. Drops redundant trailing
   * branches, renumbers ring ids from 1 and caps open stochastic ends.
   */
  finish(): BigSMILES {
    const scope = this.current;
    if (scope.kind !== NodeKind.ROOT) {
      throw new ConstructorError(`${SCOPE_NAMES[scope.kind]} is missing closing symbol.`);
    }
    removeUnnecessaryBranches(this.root);
    renumberRings(this.root);
    this.addExplicitEndGroups();
    return this.root;
  }

  /**
   * '{[$][$]CC[$][$]}' -> '[H]{[$][$]CC[$][$]}[H]'. A stochastic object first or
   * last in the molecule, with no implicit end group, gets a hydrogen on its
   * open end.
   */
  private addExplicitEndGroups(): void {
    const first = this.root.nodes[0];
    const head = first === undefined ? null : getNode(this.root, first);
    if (head?.kind === NodeKind.STOCHASTIC_OBJECT && head.bdLeft !== null && head.bondLeft === null && !this.hasImplicitEndGroup(head)) {
      const descriptor = getDescriptor(this.root, head.bdLeft);
      this.checkEndGroupBondOrder(descriptor);
      const hydrogen = register(this.root, createAtom(tokenizeAtomSymbol('[H]'), nextId(this.root), this.root.id));
      const bond = register<Bond>(this.root, {
        kind: NodeKind.BOND,
        id: nextId(this.root),
        parent: this.root.id,
        symbol: '',
        atom1: hydrogen.id,
        atom2: head.id,
        ringId: null,
      });
      this.root.nodes.unshift(hydrogen.id, bond.id);
      this.root.atoms.unshift(hydrogen.id);
      this.root.bonds.unshift(bond.id);
      this.connect(bond);
      this.declareBondSymbol(descriptor, '');
    }

    const lastId = last(this.root.nodes);
    const tail = lastId === undefined ? null : getNode(this.root, lastId);
    if (tail?.kind === NodeKind.STOCHASTIC_OBJECT && tail.bdRight !== null && tail.bondRight === null && !this.hasImplicitEndGroup(tail)) {
      this.checkEndGroupBondOrder(getDescriptor(this.root, tail.bdRight));
      this.addBondAtomPair('', tokenizeAtomSymbol('[H]'));
    }
  }

  private hasImplicitEndGroup(object: StochasticObject): boolean {
    return [object.bdLeft, object.bdRight].some(id => id !== null && getDescriptor(this.root, id).descriptor === '');
  }

  private checkEndGroupBondOrder(descriptor: BondDescriptor): void {
    const order = maxBy(descriptorBondSymbols(this.root, descriptor).map(s => BOND_ORDERS[s]), o => o) ?? 1;
    if (order > 1) {
      throw new ConstructorError('A double bond coming out of a stochastic object requires an explicit end group.');
    }
  }

  warn(message: string): void {
    this.warnings.push(message);
    if (process.env.VERBOSE) {
      console.warn(`[bigsmiles-constructor] ${message}`);
    }
  }

  private requireStochasticObject(scope: Scope): StochasticObject {
    const object = getEnclosingStochasticObject(this.root, scope);
    if (!object) {
      throw new ConstructorError('Bonding descriptors must be inside a stochastic object.');
    }
    return object;
  }

  private createStochasticObject(scope: Scope): StochasticObject {
    return register<StochasticObject>(this.root, {
      kind: NodeKind.STOCHASTIC_OBJECT,
      id: nextId(this.root),
      parent: scope.id,
      nodes: [],
      bondingDescriptors: [],
      bdLeft: null,
      bdRight: null,
      bondLeft: null,
      bondRight: null,
    });
  }

  private createBondDescriptorAtom(scope: Scope, descriptor: BondDescriptor): BondDescriptorAtom {
    const bdAtom = register<BondDescriptorAtom>(this.root, {
      kind: NodeKind.BOND_DESCRIPTOR_ATOM,
      id: nextId(this.root),
      parent: scope.id,
      descriptor: descriptor.id,
      bond: null,
    });
    descriptor.instances.push(bdAtom.id);
    return bdAtom;
  }

  private getOrCreateDescriptor(
    object: StochasticObject,
    descriptor: DescriptorSymbol,
    index: number,
    bondSymbol: BondSymbol | null,
  ): BondDescriptor {
    const existing = object.bondingDescriptors
      .map(id => getDescriptor(this.root, id))
      .find(bd => bd.descriptor === descriptor && bd.index === index);
    if (existing) {
      if (bondSymbol !== null) this.declareBondSymbol(existing, bondSymbol);
      return existing;
    }

    const bd: BondDescriptor = {
      id: nextId(this.root),
      stochasticObject: object.id,
      descriptor,
      index,
      instances: [],
      bondSymbol,
    };
    this.root.descriptors.set(bd.id, bd);
    object.bondingDescriptors.push(bd.id);
    return bd;
  }

  private declareBondSymbol(descriptor: BondDescriptor, bondSymbol: BondSymbol): void {
    if (descriptor.bondSymbol !== null && BOND_ORDERS[descriptor.bondSymbol] !== BOND_ORDERS[bondSymbol]) {
      throw new ConstructorError('Multiple bond orders to same bonding descriptor.');
    }
    descriptor.bondSymbol ??= bondSymbol;
    this.checkDescriptorBondOrder(descriptor);
  }

  private checkDescriptorBondOrder(descriptor: BondDescriptor): void {
    if (descriptorBondSymbols(this.root, descriptor).length > 1) {
      throw new ConstructorError('Multiple bond orders to same bonding descriptor.');
    }
  }

  private addBond(scope: Scope, bondSymbol: BondSymbol, atom1: Bondable, atom2: Bondable): Bond {
    const bond = register<Bond>(this.root, {
      kind: NodeKind.BOND,
      id: nextId(this.root),
      parent: scope.id,
      symbol: bondSymbol,
      atom1: atom1.id,
      atom2: atom2.id,
      ringId: null,
    });
    scope.nodes.push(bond.id);
    this.root.bonds.push(bond.id);
    this.connect(bond);
    return bond;
  }

  /**
   * Register a bond on both of its ends. A stochastic object takes it as its
   * right bond when it is the first end and as its left bond otherwise.
   */
  private connect(bond: Bond): void {
    if (bond.atom2 === null) {
      throw new ConstructorError(`Ring ${bond.ringId ?? ''} is not closed.`);
    }
    let ends = [getBondable(this.root, bond.atom1), getBondable(this.root, bond.atom2)];
    if (bond.ringId !== null && ends[1]?.kind === NodeKind.STOCHASTIC_OBJECT) {
      ends = ends.reverse();
    }

    ends.forEach((end, i) => {
      switch (end.kind) {
        case NodeKind.ATOM:
          end.bonds.push(bond.id);
          this.checkValence(end);
          break;
        case NodeKind.BOND_DESCRIPTOR_ATOM:
          if (end.bond !== null) {
            throw new ConstructorError('Bonding descriptor already has a bond.');
          }
          end.bond = bond.id;
          this.checkDescriptorBondOrder(getDescriptor(this.root, end.descriptor));
          break;
        case NodeKind.STOCHASTIC_OBJECT:
          if (i === 0) {
            if (end.bondRight !== null) {
              throw new ConstructorError('Stochastic object already has a right bond.');
            }
            end.bondRight = bond.id;
            if (end.bdRight !== null && bond.symbol !== '.') this.declareBondSymbol(getDescriptor(this.root, end.bdRight), bond.symbol);
          } else {
            if (end.bondLeft !== null) {
              throw new ConstructorError('Stochastic object already has a left bond.');
            }
            end.bondLeft = bond.id;
          }
          break;
      }
    });
  }

  private checkValence(node: Bondable): void {
    if (node.kind !== NodeKind.ATOM) return;
    if (bondsAvailable(this.root, node) >= 0) return;
    if (!increaseValence(this.root, node)) {
      throw new ConstructorError(`Too many bonds trying to be made to ${node.symbol} (valence ${node.valence}).`);
    }
  }

  private getCommonBond(atom1: Bondable, atom2: Bondable): Bond | null {
    const bonds1 = getBondIds(atom1);
    if (atom2.kind === NodeKind.STOCHASTIC_OBJECT) {
      if (atom2.bondRight !== null && bonds1.includes(atom2.bondRight)) {
        throw new ConstructorError("An atom can't have two bonds to the same stochastic object.");
      }
      return null;
    }
    const shared = getBondIds(atom2).find(id => bonds1.includes(id));
    return shared === undefined ? null : getBond(this.root, shared);
  }

  private removeRing(ring: Bond, ringScope: Scope): void {
    this.root.rings = this.root.rings.filter(id => id !== ring.id);
    this.root.bonds = this.root.bonds.filter(id => id !== ring.id);
    if (ringScope.kind === NodeKind.STOCHASTIC_FRAGMENT) {
      ringScope.rings = ringScope.rings.filter(id => id !== ring.id);
    }
    this.root.registry.delete(ring.id);
  }

  private collectDescriptors(scope: StochasticFragment | Branch): number[] {
    return scope.nodes.flatMap(id => {
      const node = getNode(this.root, id);
      if (node.kind === NodeKind.BOND_DESCRIPTOR_ATOM) return [node.descriptor];
      if (node.kind === NodeKind.BRANCH) return this.collectDescriptors(node);
      return [];
    });
  }
}
