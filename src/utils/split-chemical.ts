import type { BigSMILES, Node } from 'types';
import { NodeKind } from 'types';
import { sumBy } from 'es-toolkit';
import { BOND_ORDERS } from 'src/constants';
import { BigSMILESError } from 'src/errors';
import { generateNodes } from 'src/generators/bigsmiles-generator';
import { getBond, getNode, isScope } from 'src/utils/node-utils';
import { parseBigSMILES } from 'parser';

function collectNodes(root: BigSMILES, ids: readonly number[]): Node[] {
  return ids.flatMap(id => {
    const node = getNode(root, id);
    return isScope(node) ? [node, ...collectNodes(root, node.nodes)] : [node];
  });
}

function charge(nodes: readonly Node[]): number {
  return sumBy(nodes, node => (node.kind === NodeKind.ATOM ? node.charge : 0));
}

/** True when some non-zero bond joins a node in `ids` to one outside it. */
function isBridged(root: BigSMILES, ids: ReadonlySet<number>): boolean {
  return root.bonds.some(id => {
    const bond = getBond(root, id);
    if (bond.atom2 === null || BOND_ORDERS[bond.symbol] === 0) return false;
    return ids.has(bond.atom1) !== ids.has(bond.atom2);
  });
}

/**
 * Split a molecule at its top-level '.' bonds into separately parsed parts,
 * 'CCO.[Na+].[Cl-]' -> ['CCO', '[Na+].[Cl-]']. A cut is made only where the
 * part on its left is neutral and no ring or bond crosses it. Returns `[root]`
 * when nothing splits.
 */
export function splitChemical(root: BigSMILES): BigSMILES[] {
  const segments: number[][] = [];
  let start = 0;
  const seen = new Set<number>();

  root.nodes.forEach((id, index) => {
    const node = getNode(root, id);
    if (node.kind !== NodeKind.BOND || node.symbol !== '.') return;

    const candidate = root.nodes.slice(start, index);
    const nodes = collectNodes(root, candidate);
    const left = new Set([...seen, ...nodes.map(n => n.id)]);
    if (charge(nodes) !== 0 || isBridged(root, left)) return;

    segments.push(candidate);
    nodes.forEach(n => seen.add(n.id));
    start = index + 1;
  });

  if (segments.length === 0) return [root];
  segments.push(root.nodes.slice(start));

  return segments.map(ids => {
    const text = generateNodes(root, ids);
    const result = parseBigSMILES(text);
    const [error] = result.errors;
    if (error || !result.bigsmiles) {
      throw new BigSMILESError(`Could not split '${text}' out of the molecule.`, { cause: error });
    }
    return result.bigsmiles;
  });
}
