import { describe, it, expect } from 'vitest';
import { tokenize, TokenKind } from 'src/parsers/tokenizer';
import { validateTokens } from 'src/validators/token-validator';
import { validateString } from 'src/validators/string-validator';
import { ValidationError } from 'src/errors';

function ringValues(text: string, warnings: string[] = []): string[] {
  return validateTokens(tokenize(text), warnings)
    .filter(t => t.kind === TokenKind.RING || t.kind === TokenKind.RING2)
    .map(t => t.value);
}

describe('validateTokens', () => {
  it('should leave paired ring ids alone', () => {
    const warnings: string[] = [];
    expect(ringValues('C1CCCCC1', warnings)).toEqual(['1', '1']);
    expect(ringValues('C%10CC%10')).toEqual(['%10', '%10']);
    expect(warnings).toHaveLength(0);
  });

  it('should renumber a ring id reused for several rings', () => {
    const warnings: string[] = [];
    expect(ringValues('C1CC1C1CC1', warnings)).toEqual(['1', '1', '2', '2']);
    expect(warnings).toEqual(["Ring index '1' used for 2 rings; renumbering."]);
  });

  it('should give every later pair its own id', () => {
    expect(ringValues('C1CC1C1CC1C1CC1')).toEqual(['1', '1', '2', '2', '3', '3']);
    expect(ringValues('C1CC1C2CC2C1CC1')).toEqual(['1', '1', '2', '2', '3', '3']);
  });

  it('should reject an unpaired ring id', () => {
    expect(() => validateTokens(tokenize('CCCCC1'), [])).toThrow(
      "Invalid BigSMILES. Missing ring index. Only one found for: '1'.",
    );
  });

  it('should reject an odd number of ring ids', () => {
    expect(() => validateTokens(tokenize('C1CC1C1'), [])).toThrow(ValidationError);
  });
});

describe('validateString', () => {
  it('should accept balanced brackets', () => {
    expect(() => validateString('CC(C){[$][$]CC[$][$]}')).not.toThrow();
  });

  it('should name the missing closing symbol', () => {
    expect(() => validateString('CC(C')).toThrow("Invalid BigSMILES. Missing 1 ')'.");
    expect(() => validateString('{[$]CC[$]')).toThrow("Invalid BigSMILES. Missing 1 '}'.");
  });

  it('should name the missing opening symbol', () => {
    expect(() => validateString('C$]]')).toThrow("Invalid BigSMILES. Missing 2 '['.");
  });
});
