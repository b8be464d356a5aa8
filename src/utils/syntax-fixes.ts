import type { BigSMILES, Scope } from 'types';
import { NodeKind } from 'types';
import { last } from 'es-toolkit';
import { getBond, getNode, isScope } from 'src/utils/node-utils';

/**
 * A branch closing its parent adds nothing: 'CC(CC)' is 'CCCC'. Flatten every
 * such branch, innermost first, so 'CC(CC(CC))' becomes 'CCCCCC'.
 */
export function removeUnnecessaryBranches(root: BigSMILES, scope: Scope = root): void {
  for (const id of scope.nodes) {
    const node = getNode(root, id);
    if (isScope(node)) removeUnnecessaryBranches(root, node);
  }

  const lastId = last(scope.nodes);
  if (lastId === undefined) return;
  const branch = getNode(root, lastId);
  if (branch.kind !== NodeKind.BRANCH) return;

  for (const id of branch.nodes) {
    getNode(root, id).parent = scope.id;
  }
  scope.nodes = [...scope.nodes.slice(0, -1), ...branch.nodes];
  root.registry.delete(branch.id);
}

/** Ring ids become 1, 2, 3... in the order the rings were opened. */
export function renumberRings(root: BigSMILES): void {
  root.rings.forEach((id, index) => {
    getBond(root, id).ringId = index + 1;
  });
}
