import { ValidationError } from 'src/errors';

const BRACKET_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['(', ')'],
  ['{', '}'],
  ['[', ']'],
];

function count(text: string, symbol: string): number {
  return text.split(symbol).length - 1;
}

/**
 * Check that every opening bracket has a closing partner before tokenizing.
 */
export function validateString(text: string): void {
  for (const [open, close] of BRACKET_PAIRS) {
    const opened = count(text, open);
    const closed = count(text, close);
    if (opened > closed) {
      throw new ValidationError(`Invalid BigSMILES. Missing ${opened - closed} '${close}'.`);
    }
    if (closed > opened) {
      throw new ValidationError(`Invalid BigSMILES. Missing ${closed - opened} '${open}'.`);
    }
  }
}
