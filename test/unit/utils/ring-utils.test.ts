import { describe, it, expect } from 'vitest';
import { tokenize } from 'src/parsers/tokenizer';
import { ringIdOf } from 'src/utils/ring-utils';

describe('ringIdOf', () => {
  it('should read one- and two-digit ring ids', () => {
    const [, one, , , , , twelve] = tokenize('C1CC1C%12');
    expect(ringIdOf(one!)).toBe(1);
    expect(ringIdOf(twelve!)).toBe(12);
  });
});
