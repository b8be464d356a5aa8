import type { BigSMILES } from 'types';
import { NodeKind } from 'types';
import { ValidationError } from 'src/errors';
import { getNode } from 'src/utils/node-utils';
import { bondsAvailable, calculateValence } from 'src/utils/valence-calculator';

/**
 * Validate that no atom uses more bonds than its valence and charge allow
 */
export function validateValences(root: BigSMILES, errors: ValidationError[]): void {
  for (const id of root.atoms) {
    const atom = getNode(root, id);
    if (atom.kind !== NodeKind.ATOM) continue;

    if (bondsAvailable(root, atom) < 0) {
      errors.push(
        new ValidationError(
          `Atom ${atom.symbol} has ${calculateValence(root, atom)} bonds but valence ${atom.valence} with charge ${atom.charge}.`,
        ),
      );
    }
  }
}
