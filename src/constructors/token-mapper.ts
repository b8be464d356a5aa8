import type { BondSymbol } from 'types';
import { NodeKind } from 'types';
import { BigSMILESError, ConstructorError } from 'src/errors';
import { TokenKind, tokenizeAtomSymbol, tokenizeBondingDescriptor, type Token } from 'src/parsers/tokenizer';
import { getPrior, isAromatic } from 'src/utils/node-utils';
import { ringIdOf } from 'src/utils/ring-utils';
import type { BigSMILESConstructor } from 'src/constructors/bigsmiles-constructor';

/** Tokens still to be read. Handlers may consume the tokens they look ahead at. */
export class TokenStream {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  get position(): number {
    return this.index;
  }

  peek(): Token | undefined {
    return this.tokens[this.index];
  }

  next(): Token | undefined {
    const token = this.tokens[this.index];
    if (token) this.index++;
    return token;
  }
}

type TokenHandler = (builder: BigSMILESConstructor, stream: TokenStream, token: Token) => void;

const ATOM_TOKENS: ReadonlySet<TokenKind> = new Set([TokenKind.ATOM, TokenKind.AROMATIC, TokenKind.ATOM_EXTEND]);
const DESCRIPTOR_TOKENS: ReadonlySet<TokenKind> = new Set([TokenKind.BOND_DESCRIPTOR, TokenKind.IMPLICIT_END_GROUP]);
const RING_TOKENS: ReadonlySet<TokenKind> = new Set([TokenKind.RING, TokenKind.RING2]);

function toBondSymbol(value: string): BondSymbol {
  switch (value) {
    case '':
    case '-':
    case '=':
    case '#':
    case '$':
    case ':':
    case '.':
      return value;
    default:
      throw new ConstructorError(`Unknown bond symbol: ${value}`);
  }
}

function isEmptyRoot(builder: BigSMILESConstructor): boolean {
  return builder.current.kind === NodeKind.ROOT && builder.current.nodes.length === 0;
}

const mapAtom: TokenHandler = (builder, _stream, token) => {
  const scope = builder.current;
  const parts = tokenizeAtomSymbol(token.value);
  if (scope.nodes.length === 0 && (scope.kind === NodeKind.ROOT || scope.kind === NodeKind.STOCHASTIC_FRAGMENT)) {
    builder.addAtom(parts);
    return;
  }
  const aromaticPair =
    token.kind === TokenKind.AROMATIC &&
    isAromatic(builder.root, getPrior(builder.root, scope, [NodeKind.ATOM, NodeKind.BOND_DESCRIPTOR_ATOM, NodeKind.STOCHASTIC_OBJECT]));
  builder.addBondAtomPair(aromaticPair ? ':' : '', parts);
};

const mapBond: TokenHandler = (builder, stream, token) => {
  if (isEmptyRoot(builder)) {
    throw new ConstructorError("Bond can't be the first symbol.");
  }
  mapBondTo(builder, stream, toBondSymbol(token.value));
};

const mapDisconnected: TokenHandler = (builder, stream) => {
  if (isEmptyRoot(builder)) {
    throw new ConstructorError("Disconnect can't be the first symbol.");
  }
  const next = stream.peek();
  if (!next || !(ATOM_TOKENS.has(next.kind) || next.kind === TokenKind.STOCHASTIC_START)) {
    throw new ConstructorError('Disconnect must be followed by an atom or a stochastic object.');
  }
  mapBondTo(builder, stream, '.');
};

function mapBondTo(builder: BigSMILESConstructor, stream: TokenStream, bondSymbol: BondSymbol): void {
  const next = stream.next();
  if (!next) {
    throw new ConstructorError("Bond can't be the last symbol.");
  }
  if (ATOM_TOKENS.has(next.kind)) {
    builder.addBondAtomPair(bondSymbol, tokenizeAtomSymbol(next.value));
  } else if (next.kind === TokenKind.BOND_DESCRIPTOR) {
    builder.addBondBondingDescriptorPair(bondSymbol, ...tokenizeBondingDescriptor(next.value));
  } else if (next.kind === TokenKind.STOCHASTIC_START) {
    openStochasticObject(builder, stream, bondSymbol);
  } else if (RING_TOKENS.has(next.kind)) {
    builder.addRing(ringIdOf(next), bondSymbol);
  } else {
    throw new ConstructorError(`Bond can't be followed by: ${next.kind} '${next.value}'.`);
  }
}

const mapBondDescriptor: TokenHandler = (builder, stream, token) => {
  if (isEmptyRoot(builder)) {
    throw new ConstructorError("Bonding descriptors can't be the first symbol.");
  }
  const [descriptor, index] = tokenizeBondingDescriptor(token.value);
  if (stream.peek()?.kind === TokenKind.STOCHASTIC_END) {
    stream.next();
    builder.closeStochasticFragment();
    builder.closeStochasticObject(descriptor, index);
    return;
  }
  const scope = builder.current;
  if (scope.kind === NodeKind.STOCHASTIC_FRAGMENT && scope.nodes.length === 0) {
    builder.addBondingDescriptor(descriptor, index);
  } else {
    builder.addBondBondingDescriptorPair('', descriptor, index);
  }
};

const mapBranchStart: TokenHandler = builder => {
  if (isEmptyRoot(builder)) {
    throw new ConstructorError("BigSMILES can't start with a branch symbol.");
  }
  builder.openBranch();
};

const mapBranchEnd: TokenHandler = builder => {
  builder.closeBranch();
};

const mapRing: TokenHandler = (builder, _stream, token) => {
  if (isEmptyRoot(builder)) {
    throw new ConstructorError("Ring can't be the first symbol.");
  }
  builder.addRing(ringIdOf(token));
};

const mapStochasticStart: TokenHandler = (builder, stream) => {
  openStochasticObject(builder, stream, null);
};

/** '{' must be followed by the left-end descriptor, '[]' when implicit. */
function openStochasticObject(builder: BigSMILESConstructor, stream: TokenStream, bondSymbol: BondSymbol | null): void {
  const next = stream.next();
  if (!next || !DESCRIPTOR_TOKENS.has(next.kind)) {
    throw new ConstructorError('Stochastic object must start with a bonding descriptor (or implicit bonding descriptor).');
  }
  const [descriptor, index] = tokenizeBondingDescriptor(next.value);
  if (isEmptyRoot(builder)) {
    builder.openStochasticObject(descriptor, index);
  } else {
    builder.openStochasticObjectWithBond(bondSymbol ?? '', descriptor, index);
  }
}

const mapStochasticEnd: TokenHandler = () => {
  throw new ConstructorError('Stochastic object must end with a bonding descriptor (or implicit bonding descriptor).');
};

const mapSeparator: TokenHandler = builder => {
  builder.closeOpenStochasticFragment();
};

const mapReaction: TokenHandler = () => {
  throw new ConstructorError('Reaction symbol detected. Reactions are not supported.');
};

const skipSymbol: TokenHandler = (builder, _stream, token) => {
  builder.warn(`Symbol skipped: '${token.value}' (${token.kind}).`);
};

export const TOKEN_HANDLERS: Readonly<Record<TokenKind, TokenHandler>> = Object.freeze({
  [TokenKind.BOND]: mapBond,
  [TokenKind.ATOM]: mapAtom,
  [TokenKind.AROMATIC]: mapAtom,
  [TokenKind.ATOM_EXTEND]: mapAtom,
  [TokenKind.BRANCH_START]: mapBranchStart,
  [TokenKind.BRANCH_END]: mapBranchEnd,
  [TokenKind.RING]: mapRing,
  [TokenKind.RING2]: mapRing,
  [TokenKind.BOND_EZ]: skipSymbol,
  [TokenKind.DISCONNECTED]: mapDisconnected,
  [TokenKind.BOND_DESCRIPTOR_LADDER]: skipSymbol,
  [TokenKind.BOND_DESCRIPTOR]: mapBondDescriptor,
  [TokenKind.STOCHASTIC_SEPARATOR]: mapSeparator,
  [TokenKind.STOCHASTIC_START]: mapStochasticStart,
  [TokenKind.STOCHASTIC_END]: mapStochasticEnd,
  [TokenKind.IMPLICIT_END_GROUP]: mapBondDescriptor,
  [TokenKind.RXN]: mapReaction,
});

/**
 * Feed every token to the constructor. Any failure is rethrown naming the
 * token it happened on.
 */
export function mapTokens(builder: BigSMILESConstructor, tokens: readonly Token[]): void {
  const stream = new TokenStream(tokens);
  let token = stream.next();
  while (token) {
    try {
      TOKEN_HANDLERS[token.kind](builder, stream, token);
    } catch (error) {
      if (!(error instanceof BigSMILESError)) throw error;
      throw new BigSMILESError(`Issue with token '${token.kind}: ${token.value}'. (token: ${stream.position})`, {
        cause: error,
        position: token.position,
      });
    }
    token = stream.next();
  }
}
