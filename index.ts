export { parseBigSMILES } from './parser';
export { generateBigSMILES, DEFAULT_GENERATOR_OPTIONS } from 'src/generators/bigsmiles-generator';
export { tokenize, tokenizeAtomSymbol, tokenizeBondingDescriptor, TokenKind } from 'src/parsers/tokenizer';
export type { Token, AtomSymbol } from 'src/parsers/tokenizer';
export { validateString } from 'src/validators/string-validator';
export { validateTokens } from 'src/validators/token-validator';
export { validateBigSMILES } from 'src/validators/bigsmiles-validator';
export { BigSMILESConstructor } from 'src/constructors/bigsmiles-constructor';
export { mapTokens } from 'src/constructors/token-mapper';
export { splitChemical } from 'src/utils/split-chemical';
export { bondsAvailable, implicitHydrogens } from 'src/utils/valence-calculator';
export { getNode, getAtom, getBond, getDescriptor, collectStochasticObjects } from 'src/utils/node-utils';
export { BigSMILESError, TokenizeError, ConstructorError, ValidationError } from 'src/errors';
export { NodeKind } from './types';
export type {
  Atom,
  BigSMILES,
  Bond,
  BondDescriptor,
  BondDescriptorAtom,
  BondSymbol,
  Branch,
  DescriptorSymbol,
  GeneratorOptions,
  Node,
  ParseResult,
  StochasticFragment,
  StochasticObject,
} from './types';
