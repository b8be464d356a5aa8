import { ConstructorError } from 'src/errors';
import { BOND_ORDERS } from 'src/constants';
import { NodeKind } from 'types';
import type {
  Atom,
  BigSMILES,
  Bond,
  BondableKind,
  Bondable,
  BondDescriptor,
  BondDescriptorAtom,
  BondSymbol,
  Branch,
  Node,
  RingScope,
  Scope,
  StochasticFragment,
  StochasticObject,
} from 'types';

export const ROOT_ID = 0;

export function createBigSMILES(): BigSMILES {
  return {
    kind: NodeKind.ROOT,
    id: ROOT_ID,
    nodes: [],
    atoms: [],
    bonds: [],
    rings: [],
    registry: new Map(),
    descriptors: new Map(),
    nextId: ROOT_ID + 1,
  };
}

export function nextId(root: BigSMILES): number {
  return root.nextId++;
}

export function register<T extends Node>(root: BigSMILES, node: T): T {
  root.registry.set(node.id, node);
  return node;
}

export function getNode(root: BigSMILES, id: number): Node {
  const node = root.registry.get(id);
  if (!node) {
    throw new ConstructorError(`Unknown node id: ${id}`);
  }
  return node;
}

export function getAtom(root: BigSMILES, id: number): Atom {
  const node = getNode(root, id);
  if (node.kind !== NodeKind.ATOM) {
    throw new ConstructorError(`Node ${id} is not an atom.`);
  }
  return node;
}

export function getBond(root: BigSMILES, id: number): Bond {
  const node = getNode(root, id);
  if (node.kind !== NodeKind.BOND) {
    throw new ConstructorError(`Node ${id} is not a bond.`);
  }
  return node;
}

export function getBondDescriptorAtom(root: BigSMILES, id: number): BondDescriptorAtom {
  const node = getNode(root, id);
  if (node.kind !== NodeKind.BOND_DESCRIPTOR_ATOM) {
    throw new ConstructorError(`Node ${id} is not a bonding descriptor.`);
  }
  return node;
}

export function getStochasticObject(root: BigSMILES, id: number): StochasticObject {
  const node = getNode(root, id);
  if (node.kind !== NodeKind.STOCHASTIC_OBJECT) {
    throw new ConstructorError(`Node ${id} is not a stochastic object.`);
  }
  return node;
}

export function getStochasticFragment(root: BigSMILES, id: number): StochasticFragment {
  const node = getNode(root, id);
  if (node.kind !== NodeKind.STOCHASTIC_FRAGMENT) {
    throw new ConstructorError(`Node ${id} is not a stochastic fragment.`);
  }
  return node;
}

export function getDescriptor(root: BigSMILES, id: number): BondDescriptor {
  const descriptor = root.descriptors.get(id);
  if (!descriptor) {
    throw new ConstructorError(`Unknown bonding descriptor id: ${id}`);
  }
  return descriptor;
}

export function isBondable(node: Node): node is Bondable {
  return (
    node.kind === NodeKind.ATOM ||
    node.kind === NodeKind.BOND_DESCRIPTOR_ATOM ||
    node.kind === NodeKind.STOCHASTIC_OBJECT
  );
}

export function isScope(node: Node): node is Branch | StochasticFragment | StochasticObject {
  return (
    node.kind === NodeKind.BRANCH ||
    node.kind === NodeKind.STOCHASTIC_FRAGMENT ||
    node.kind === NodeKind.STOCHASTIC_OBJECT
  );
}

export function getBondable(root: BigSMILES, id: number): Bondable {
  const node = getNode(root, id);
  if (!isBondable(node)) {
    throw new ConstructorError(`Node ${id} can not be bonded.`);
  }
  return node;
}

export function getScope(root: BigSMILES, id: number): Scope {
  if (id === root.id) return root;
  const node = getNode(root, id);
  if (!isScope(node)) {
    throw new ConstructorError(`Node ${id} does not hold other nodes.`);
  }
  return node;
}

export function getParentScope(root: BigSMILES, scope: Scope): Scope | null {
  return scope.kind === NodeKind.ROOT ? null : getScope(root, scope.parent);
}

/** Innermost stochastic object containing `scope` (itself included). */
export function getEnclosingStochasticObject(root: BigSMILES, scope: Scope): StochasticObject | null {
  let current: Scope | null = scope;
  while (current) {
    if (current.kind === NodeKind.STOCHASTIC_OBJECT) return current;
    current = getParentScope(root, current);
  }
  return null;
}

/** Ring ids are scoped to the nearest stochastic fragment, or the root. */
export function getRingScope(root: BigSMILES, scope: Scope): RingScope {
  let current: Scope | null = scope;
  while (current) {
    if (current.kind === NodeKind.STOCHASTIC_FRAGMENT || current.kind === NodeKind.ROOT) return current;
    current = getParentScope(root, current);
  }
  return root;
}

export function containsStochasticObject(root: BigSMILES, scope: Scope = root): boolean {
  return scope.nodes.some(id => {
    const node = getNode(root, id);
    if (node.kind === NodeKind.STOCHASTIC_OBJECT) return true;
    return node.kind === NodeKind.BRANCH && containsStochasticObject(root, node);
  });
}

/**
 * Last node of one of `kinds` in `scope`, looking past branches. An empty scope
 * defers once to its parent, so the first atom of a branch bonds to the atom
 * before the branch.
 */
export function getPrior(root: BigSMILES, scope: Scope, kinds: readonly BondableKind[], reachedParent = false): Bondable {
  if (scope.nodes.length > 0) {
    for (const id of [...scope.nodes].reverse()) {
      const node = getNode(root, id);
      if (isBondable(node) && kinds.includes(node.kind)) {
        return node;
      }
    }
    throw new ConstructorError('Bond attempted to be made to a prior atom that is not there.');
  }

  const parent = getParentScope(root, scope);
  if (!reachedParent && parent) {
    return getPrior(root, parent, kinds, true);
  }
  throw new ConstructorError('Bond attempted to be made to that has nothing to bond back to.');
}

export function getBondIds(node: Bondable): number[] {
  switch (node.kind) {
    case NodeKind.ATOM:
      return node.bonds;
    case NodeKind.BOND_DESCRIPTOR_ATOM:
      return node.bond === null ? [] : [node.bond];
    case NodeKind.STOCHASTIC_OBJECT:
      return [node.bondLeft, node.bondRight].filter((id): id is number => id !== null);
  }
}

export function isAromatic(root: BigSMILES, node: Bondable): boolean {
  switch (node.kind) {
    case NodeKind.ATOM:
      return node.aromatic;
    case NodeKind.BOND_DESCRIPTOR_ATOM:
      return descriptorBondSymbols(root, getDescriptor(root, node.descriptor)).some(s => s === ':');
    case NodeKind.STOCHASTIC_OBJECT:
      return node.bdLeft !== null && descriptorBondSymbols(root, getDescriptor(root, node.bdLeft)).some(s => s === ':');
  }
}

/** Distinct bond orders seen on a descriptor's instances plus its declared boundary bond. */
export function descriptorBondSymbols(root: BigSMILES, descriptor: BondDescriptor): BondSymbol[] {
  const symbols: BondSymbol[] = [];
  const add = (symbol: BondSymbol): void => {
    if (!symbols.some(s => BOND_ORDERS[s] === BOND_ORDERS[symbol])) symbols.push(symbol);
  };
  if (descriptor.bondSymbol !== null) add(descriptor.bondSymbol);
  for (const id of descriptor.instances) {
    const instance = getBondDescriptorAtom(root, id);
    if (instance.bond !== null) add(getBond(root, instance.bond).symbol);
  }
  return symbols;
}

/** Every stochastic object in the tree, outermost first. */
export function collectStochasticObjects(root: BigSMILES, scope: Scope = root): StochasticObject[] {
  const found: StochasticObject[] = [];
  for (const id of scope.nodes) {
    const node = getNode(root, id);
    if (node.kind === NodeKind.STOCHASTIC_OBJECT) found.push(node);
    if (isScope(node)) found.push(...collectStochasticObjects(root, node));
  }
  return found;
}
