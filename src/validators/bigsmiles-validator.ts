import type { BigSMILES, BondDescriptor, Scope, StochasticObject } from 'types';
import { NodeKind } from 'types';
import { ValidationError } from 'src/errors';
import {
  collectStochasticObjects,
  descriptorBondSymbols,
  getBond,
  getDescriptor,
  getNode,
  isScope,
} from 'src/utils/node-utils';
import { validateValences } from 'src/validators/valence-validator';

/**
 * Run every check on a constructed BigSMILES. Problems are appended to `errors`.
 */
export function validateBigSMILES(root: BigSMILES, errors: ValidationError[]): void {
  validateRings(root, errors);
  for (const object of collectStochasticObjects(root)) {
    validateBondingDescriptors(root, object, errors);
  }
  validateImplicitEndGroups(root, root, errors);
  validateValences(root, errors);
}

export function validateRings(root: BigSMILES, errors: ValidationError[]): void {
  for (const id of root.rings) {
    const ring = getBond(root, id);
    if (ring.atom2 === null) {
      errors.push(new ValidationError(`Ring opened, but not closed. (ring id: ${ring.ringId ?? '?'})`));
    }
  }
}

function descriptorText(bd: BondDescriptor): string {
  return `[${bd.descriptor}${bd.index === 1 ? '' : bd.index}]`;
}

function isComplement(a: BondDescriptor, b: BondDescriptor): boolean {
  if (a.index !== b.index) return false;
  if (a.descriptor === '$') return b.descriptor === '$';
  return (a.descriptor === '<' && b.descriptor === '>') || (a.descriptor === '>' && b.descriptor === '<');
}

export function validateBondingDescriptors(root: BigSMILES, object: StochasticObject, errors: ValidationError[]): void {
  const descriptors = object.bondingDescriptors.map(id => getDescriptor(root, id));
  for (const bd of descriptors) {
    if (descriptorBondSymbols(root, bd).length > 1) {
      errors.push(new ValidationError(`Multiple bond orders to same bonding descriptor: ${descriptorText(bd)}`));
    }

    if (bd.descriptor === '$') {
      const uses = bd.instances.length + (object.bdLeft === bd.id ? 1 : 0) + (object.bdRight === bd.id ? 1 : 0);
      if (uses < 2) {
        errors.push(new ValidationError(`${descriptorText(bd)} type bonding descriptors require more than one instance in a stochastic object.`));
      }
    } else if (bd.descriptor !== '') {
      if (!descriptors.some(other => isComplement(bd, other))) {
        errors.push(new ValidationError(`${descriptorText(bd)} complementary partner not found.`));
      }
    }
  }
}

/**
 * An implicit end group '[]' may only open the very first or close the very
 * last node of the molecule.
 */
export function validateImplicitEndGroups(root: BigSMILES, scope: Scope, errors: ValidationError[]): void {
  scope.nodes.forEach((id, index) => {
    const node = getNode(root, id);
    if (node.kind === NodeKind.STOCHASTIC_OBJECT) {
      const nested = scope.kind !== NodeKind.ROOT;
      if (node.bdLeft !== null && getDescriptor(root, node.bdLeft).descriptor === '') {
        if (nested) errors.push(new ValidationError('Implicit left end group not allowed within interior.'));
        else if (index !== 0) {
          errors.push(new ValidationError('With the left end group implicit, there should be nothing to the left of the stochastic object.'));
        }
      }
      if (node.bdRight !== null && getDescriptor(root, node.bdRight).descriptor === '') {
        if (nested) errors.push(new ValidationError('Implicit right end group not allowed within interior.'));
        else if (index !== scope.nodes.length - 1) {
          errors.push(new ValidationError('With the right end group implicit, there should be nothing to the right of the stochastic object.'));
        }
      }
    }
    if (isScope(node)) validateImplicitEndGroups(root, node, errors);
  });
}
