import { describe, it, expect } from 'vitest';
import { parseBigSMILES } from 'parser';
import { generateBigSMILES, DEFAULT_GENERATOR_OPTIONS } from 'src/generators/bigsmiles-generator';
import type { BigSMILES } from 'types';

function parse(text: string): BigSMILES {
  const result = parseBigSMILES(text);
  expect(result.errors).toHaveLength(0);
  return result.bigsmiles!;
}

describe('generateBigSMILES', () => {
  it('should bracket atoms only when needed', () => {
    expect(generateBigSMILES(parse('[CH4]'))).toBe('[CH4]');
    expect(generateBigSMILES(parse('[C]'))).toBe('[C]');
    expect(generateBigSMILES(parse('[13CH3]C'))).toBe('[13CH3]C');
    expect(generateBigSMILES(parse('N[C@@H](C)C(=O)O'))).toBe('N[C@@H](C)C(=O)O');
    expect(generateBigSMILES(parse('[H]O[H]'))).toBe('[H]O[H]');
  });

  it('should write charges with the sign first', () => {
    expect(generateBigSMILES(parse('[Fe+3]'))).toBe('[Fe+3]');
    expect(generateBigSMILES(parse('[O-]C'))).toBe('[O-]C');
    expect(generateBigSMILES(parse('[S-2]'))).toBe('[S-2]');
    expect(generateBigSMILES(parse('[NH4+]'))).toBe('[NH4+]');
  });

  it('should write two-digit ring ids with %', () => {
    const text = 'C1CC2CC3CC4CC5CC6CC7CC8CC9CC%10CCC%10C9C8C7C6C5C4C3C2C1';
    expect(generateBigSMILES(parse(text))).toBe(text);
  });

  it('should hide aromatic bonds by default', () => {
    const root = parse('c1ccccc1');
    expect(generateBigSMILES(root)).toBe('c1ccccc1');
    expect(generateBigSMILES(root, { showAromaticBond: true })).toBe('c1:c:c:c:c:c1');
  });

  it('should read shown aromatic bonds back', () => {
    const shown = generateBigSMILES(parse('c1ccccc1'), { showAromaticBond: true });
    expect(generateBigSMILES(parse(shown))).toBe('c1ccccc1');
  });

  it('should show descriptor index 1 on request', () => {
    const root = parse('{[][$]CC[$][]}');
    expect(generateBigSMILES(root)).toBe('{[][$]CC[$][]}');
    expect(generateBigSMILES(root, { showBondDescriptorOneIndex: true })).toBe('{[][$1]CC[$1][]}');
  });

  it('should write ring bond symbols on the opening side only', () => {
    const root = parse('C=1CCCC1');
    expect(generateBigSMILES(root)).toBe('C=1CCCC1');
    expect(generateBigSMILES(root, { showMultiBondsOnBothRingIndex: true })).toBe('C=1CCCC=1');
  });

  it('should write ring bond symbols on both sides inside stochastic molecules', () => {
    expect(generateBigSMILES(parse('{[][$]C=1CCCC=1[$][]}'))).toBe('{[][$]C=1CCCC=1[$][]}');
  });

  it('should drop atom classes on request', () => {
    const root = parse('[CH3:1]C');
    expect(generateBigSMILES(root)).toBe('[CH3:1]C');
    expect(generateBigSMILES(root, { showAtomClass: false })).toBe('[CH3]C');
  });

  it('should not change the default options', () => {
    generateBigSMILES(parse('CC'), { showAromaticBond: true });
    expect(DEFAULT_GENERATOR_OPTIONS.showAromaticBond).toBe(false);
    expect(Object.isFrozen(DEFAULT_GENERATOR_OPTIONS)).toBe(true);
  });
});
