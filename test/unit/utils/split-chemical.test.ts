import { describe, it, expect } from 'vitest';
import { parseBigSMILES } from 'parser';
import { splitChemical } from 'src/utils/split-chemical';
import { generateBigSMILES } from 'src/generators/bigsmiles-generator';
import type { BigSMILES } from 'types';

function parse(text: string): BigSMILES {
  const result = parseBigSMILES(text);
  expect(result.errors).toHaveLength(0);
  return result.bigsmiles!;
}

describe('splitChemical', () => {
  it('should split neutral parts apart', () => {
    const parts = splitChemical(parse('CCO.[Na+].[Cl-]'));
    expect(parts.map(p => generateBigSMILES(p))).toEqual(['CCO', '[Na+].[Cl-]']);
  });

  it('should keep ion pairs together', () => {
    const parts = splitChemical(parse('[Na+].[Cl-].CCO'));
    expect(parts.map(p => generateBigSMILES(p))).toEqual(['[Na+].[Cl-]', 'CCO']);
  });

  it('should not cut through a ring', () => {
    const root = parse('C1.CCCCC1');
    expect(splitChemical(root)).toEqual([root]);
  });

  it('should return a connected molecule as is', () => {
    const root = parse('CCO');
    expect(splitChemical(root)).toEqual([root]);
  });
});
