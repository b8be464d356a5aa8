import type { Token } from 'src/parsers/tokenizer';

/** Ring id of a ring token: '1' -> 1, '%12' -> 12. */
export function ringIdOf(token: Token): number {
  return parseInt(token.value.replace('%', ''));
}
