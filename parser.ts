import type { BigSMILES, ParseResult } from './types';
import { BigSMILESError, type ValidationError } from './src/errors';
import { tokenize } from './src/parsers/tokenizer';
import { validateString } from './src/validators/string-validator';
import { validateTokens } from './src/validators/token-validator';
import { validateBigSMILES } from './src/validators/bigsmiles-validator';
import { BigSMILESConstructor } from './src/constructors/bigsmiles-constructor';
import { mapTokens } from './src/constructors/token-mapper';

/**
 * Parse a BigSMILES string into a validated graph. Malformed input does not
 * throw: it is reported in `errors`, each wrapping the error that caused it.
 */
export function parseBigSMILES(text: string): ParseResult {
  const warnings: string[] = [];
  let root: BigSMILES;

  try {
    root = construct(text, warnings);
  } catch (error) {
    if (!(error instanceof BigSMILESError)) throw error;
    return { bigsmiles: null, errors: [wrapError(text, error)], warnings };
  }

  const validationErrors: ValidationError[] = [];
  validateBigSMILES(root, validationErrors);
  if (validationErrors.length > 0) {
    return { bigsmiles: null, errors: validationErrors.map(e => wrapError(text, e)), warnings };
  }

  if (process.env.VERBOSE) {
    console.log(`[bigsmiles-parser] ${text}: ${root.atoms.length} atoms, ${root.bonds.length} bonds, ${root.rings.length} rings`);
  }
  return { bigsmiles: root, errors: [], warnings };
}

function construct(text: string, warnings: string[]): BigSMILES {
  validateString(text);
  const tokens = validateTokens(tokenize(text), warnings);
  const builder = new BigSMILESConstructor();
  try {
    mapTokens(builder, tokens);
    return builder.finish();
  } finally {
    warnings.push(...builder.warnings);
  }
}

function wrapError(text: string, error: BigSMILESError): BigSMILESError {
  return new BigSMILESError(`Parsing failed on '${text}'.`, { cause: error, position: error.position });
}
