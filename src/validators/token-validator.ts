import { countBy, maxBy } from 'es-toolkit';
import { ValidationError } from 'src/errors';
import { TokenKind, type Token } from 'src/parsers/tokenizer';
import { ringIdOf } from 'src/utils/ring-utils';

function isRingToken(token: Token): boolean {
  return token.kind === TokenKind.RING || token.kind === TokenKind.RING2;
}

function ringToken(token: Token, id: number): Token {
  const value = id > 9 ? `%${id}` : `${id}`;
  return { ...token, kind: id > 9 ? TokenKind.RING2 : TokenKind.RING, value };
}

/**
 * Check ring indices pair up. A ring id reused for several rings
 * ('C1CC1C1CC1') gets a fresh id for every pair after the first.
 */
export function validateTokens(tokens: readonly Token[], warnings: string[]): Token[] {
  const ringTokens = tokens.filter(isRingToken);
  const counts = countBy(ringTokens, t => String(ringIdOf(t)));
  let nextId = (maxBy(ringTokens.map(ringIdOf), id => id) ?? 0) + 1;

  const renumber = new Map<number, number>(); // token index -> new ring id
  for (const [key, occurrences] of Object.entries(counts)) {
    const id = parseInt(key);
    if (occurrences === 1) {
      throw new ValidationError(`Invalid BigSMILES. Missing ring index. Only one found for: '${id}'.`);
    }
    if (occurrences % 2 === 1) {
      throw new ValidationError(`Invalid BigSMILES. Odd number of ring indices (${occurrences}) for: '${id}'.`);
    }
    if (occurrences === 2) continue;

    warnings.push(`Ring index '${id}' used for ${occurrences / 2} rings; renumbering.`);
    let seen = 0;
    tokens.forEach((token, index) => {
      if (!isRingToken(token) || ringIdOf(token) !== id) return;
      seen++;
      if (seen > 2) {
        renumber.set(index, nextId);
        if (seen % 2 === 0) nextId++;
      }
    });
  }

  return tokens.map((token, index) => {
    const id = renumber.get(index);
    return id === undefined ? token : ringToken(token, id);
  });
}
