import { describe, it, expect } from 'vitest';
import { parseBigSMILES, generateBigSMILES, BigSMILESError, ConstructorError, ValidationError, NodeKind } from '../index';
import { getAtom, getStochasticFragment, getStochasticObject } from 'src/utils/node-utils';

function roundTrip(text: string): string {
  const result = parseBigSMILES(text);
  expect(result.errors).toHaveLength(0);
  return generateBigSMILES(result.bigsmiles!);
}

describe('BigSMILES round trips', () => {
  const canonical = [
    'CCCCCC',
    'C=CC#N',
    'OC(=O)CC',
    'c1ccccc1',
    'c1ccccc1-c2ccccc2',
    'C1CCCCC1',
    '[O-][N+]1=CC=CC=C1',
    '[CH3:1][CH2:2][CH2:3][CH2:4][CH2:5][CH3:6]',
    'C1.CCCCC1',
    '[Na+].[Cl-]',
    '[H]{[$][$]CC[$][$]}[H]',
    'CC{[>][<]CC(C)[>][<]}CC(C)=C',
    '{[][$]CC[$],[$]CC(CC)[$][]}',
    'C={[$][$]=CC=[$][$]}=C',
    'CC(CC){[<][>]CC(C)[<2][>2]}CCO',
    '[H]{[>][<]CC([>2])[>],[<2]CC[>2],[<2][H][<]}[H]',
    '{[][$]CC[$][$]}{[$][$]CCCC[$],[$]CC(CC)[$][]}',
  ];

  it.each(canonical)('should write %s back unchanged', text => {
    expect(roundTrip(text)).toBe(text);
  });

  it.each([
    ['CC(CC)(CC)', 'CC(CC)CC'],
    ['CC(CC(CC))', 'CCCCCC'],
    ['CCCCCC()', 'CCCCCC'],
    ['C12CCCC12C', 'C=1CCCC1C'],
    ['C2CCCC2C', 'C1CCCC1C'],
    ['C%10CCCC%10C', 'C1CCCC1C'],
    ['O1CCCCC1N1CCCCC1', 'O1CCCCC1N2CCCCC2'],
    ['C C', 'CC'],
  ])('should normalize %s to %s', (text, expected) => {
    expect(roundTrip(text)).toBe(expected);
  });

  it.each([
    ['{[$][$]CC[$][$]}', '[H]{[$][$]CC[$][$]}[H]'],
    ['CC{[$][$]CC[$][$]}', 'CC{[$][$]CC[$][$]}[H]'],
    ['{[>][<]CC[>][<]}CC', '[H]{[>][<]CC[>][<]}CC'],
  ])('should cap the open ends of %s with hydrogen', (text, expected) => {
    expect(roundTrip(text)).toBe(expected);
  });

  it('should keep writing the same string once normalized', () => {
    const once = roundTrip('CC(C(C1CC1))');
    expect(roundTrip(once)).toBe(once);
  });
});

describe('parseBigSMILES', () => {
  it('should build nylon-6,6 as one object with two fragments', () => {
    const text = '[H]O{[>][<]C(=O)CCCCC(=O)[<],[>]NCCCCCCN[>][<]}[H]';
    const result = parseBigSMILES(text);
    expect(result.errors).toHaveLength(0);
    const root = result.bigsmiles!;

    const objects = root.nodes.map(id => root.registry.get(id)!).filter(n => n.kind === NodeKind.STOCHASTIC_OBJECT);
    expect(objects).toHaveLength(1);
    const object = getStochasticObject(root, objects[0]!.id);
    expect(object.nodes).toHaveLength(2);
    for (const id of object.nodes) {
      const fragment = getStochasticFragment(root, id);
      const bdAtoms = fragment.nodes.filter(n => root.registry.get(n)?.kind === NodeKind.BOND_DESCRIPTOR_ATOM);
      expect(bdAtoms).toHaveLength(2);
      expect(fragment.bondingDescriptors).toHaveLength(1);
    }
    expect(generateBigSMILES(root)).toBe(text);
  });

  it('should flag lowercase atoms as aromatic', () => {
    const root = parseBigSMILES('Cc1ccccc1').bigsmiles!;
    const [methyl, ring] = root.atoms.map(id => getAtom(root, id));
    expect(methyl!.aromatic).toBe(false);
    expect(ring!).toMatchObject({ symbol: 'C', aromatic: true, organic: true });
  });

  it('should report an unclosed ring', () => {
    const result = parseBigSMILES('CCCCC1');
    expect(result.bigsmiles).toBeNull();
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]!.rootCause).toBeInstanceOf(ValidationError);
    expect(result.errors[0]!.message).toBe("Parsing failed on 'CCCCC1'.");
  });

  it('should report a lone [$] descriptor', () => {
    const result = parseBigSMILES('{[][$]CC[]}');
    expect(result.bigsmiles).toBeNull();
    expect(result.errors[0]!.rootCause).toBeInstanceOf(ValidationError);
  });

  it('should name the failing token', () => {
    const result = parseBigSMILES('=CC');
    const [error] = result.errors;
    expect(error).toBeInstanceOf(BigSMILESError);
    expect(error!.rootCause).toBeInstanceOf(ConstructorError);
    expect(error!.fullMessage).toBe(
      "Parsing failed on '=CC'.\n\tIssue with token 'Bond: ='. (token: 1)\n\t\tBond can't be the first symbol.",
    );
  });

  it.each([
    ['(CC)', "BigSMILES can't start with a branch symbol."],
    ['C((C))', "Branch can't start with a branch."],
    ['CC=', "Bond can't be the last symbol."],
    ['C.', 'Disconnect must be followed by an atom or a stochastic object.'],
    ['CC>CC', 'Reaction symbol detected. Reactions are not supported.'],
    ['C(C)(C)(C)(C)C', 'Too many bonds trying to be made to C (valence 4).'],
    ['{[$][$]=CC[$][$]}', 'Multiple bond orders to same bonding descriptor.'],
    ['{[$]C[$]C}', 'Stochastic object must end with a bonding descriptor (or implicit bonding descriptor).'],
    ['{[$][$]=CC=[$][$]}', 'A double bond coming out of a stochastic object requires an explicit end group.'],
    ['c1c1', "Ring 1 can't be merged into an aromatic bond."],
  ])('should reject %s', (text, message) => {
    const result = parseBigSMILES(text);
    expect(result.bigsmiles).toBeNull();
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]!.rootCause.message).toBe(message);
  });

  it('should warn about skipped cis/trans marks', () => {
    const result = parseBigSMILES('F/C=C/F');
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toEqual(["Symbol skipped: '/' (BondEZ).", "Symbol skipped: '/' (BondEZ)."]);
    expect(generateBigSMILES(result.bigsmiles!)).toBe('FC=CF');
  });

  it('should warn when renumbering reused ring ids', () => {
    const result = parseBigSMILES('C1CC1C1CC1');
    expect(result.warnings).toEqual(["Ring index '1' used for 2 rings; renumbering."]);
    expect(generateBigSMILES(result.bigsmiles!)).toBe('C1CC1C2CC2');
  });

  it('should report unbalanced brackets before tokenizing', () => {
    const result = parseBigSMILES('{[$]CC[$]');
    expect(result.errors[0]!.fullMessage).toBe("Parsing failed on '{[$]CC[$]'.\n\tInvalid BigSMILES. Missing 1 '}'.");
  });
});
