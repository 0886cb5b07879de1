import { describe, expect, it } from 'vitest';
import {
  DEFAULT_MAX_CHARS,
  DefinitionAssembler,
  DefinitionCeilingError,
  assembleDefinition,
  definitionHeader,
} from './assembler.js';

describe('DefinitionAssembler', () => {
  it('starts accumulating with the header in place', () => {
    const assembler = new DefinitionAssembler('Header\n\n', 100);
    expect(assembler.state).toBe('accumulating');
    expect(assembler.size).toBe(8);
    expect(assembler.build()).toBe('Header\n\n');
  });

  it('accepts a block that lands exactly on the ceiling', () => {
    const assembler = new DefinitionAssembler('abc', 10);
    expect(assembler.tryAppend('1234567')).toBe(true);
    expect(assembler.size).toBe(10);
    expect(assembler.state).toBe('accumulating');
  });

  it('becomes full on the first overflow and refuses everything afterwards', () => {
    const assembler = new DefinitionAssembler('', 10);
    expect(assembler.tryAppend('123456')).toBe(true);
    expect(assembler.tryAppend('12345')).toBe(false);
    expect(assembler.state).toBe('full');
    expect(assembler.tryAppend('1')).toBe(false);
    expect(assembler.build()).toBe('123456');
    expect(assembler.included).toBe(1);
  });

  it('rejects a header longer than the ceiling', () => {
    expect(() => new DefinitionAssembler('x'.repeat(11), 10)).toThrow(DefinitionCeilingError);
  });

  it('rejects a non-positive ceiling', () => {
    expect(() => new DefinitionAssembler('', 0)).toThrow(RangeError);
  });
});

describe('assembleDefinition', () => {
  it('includes exactly five 3,500 character blocks under a 20,000 ceiling', () => {
    const blocks = Array.from({ length: 10 }, (_, index) => String(index).repeat(3500));
    const result = assembleDefinition('', blocks, 20000);

    expect(result.included).toBe(5);
    expect(result.truncated).toBe(true);
    expect(result.text).toBe(blocks.slice(0, 5).join(''));
    expect(result.text).toHaveLength(17500);
  });

  it('stops at the first block that does not fit, even if later ones would', () => {
    const result = assembleDefinition('H', ['aaaa', 'bbbbbbbb', 'c'], 8);
    expect(result.text).toBe('Haaaa');
    expect(result.included).toBe(1);
    expect(result.truncated).toBe(true);
  });

  it('emits only the header when nothing fits', () => {
    const result = assembleDefinition('Header', ['a block that is far too long'], 10);
    expect(result).toEqual({ text: 'Header', included: 0, truncated: true });
  });

  it('is not truncated when every block fits', () => {
    const result = assembleDefinition('H', ['a', 'b'], DEFAULT_MAX_CHARS);
    expect(result).toEqual({ text: 'Hab', included: 2, truncated: false });
  });

  it('never exceeds the ceiling for any mix of block sizes', () => {
    const blocks = Array.from({ length: 40 }, (_, index) => 'z'.repeat(((index * 37) % 90) + 1));
    for (const ceiling of [1, 5, 50, 333, 1000, 5000]) {
      const result = assembleDefinition('', blocks, ceiling);
      expect(result.text.length).toBeLessThanOrEqual(ceiling);
      expect(result.text).toBe(blocks.slice(0, result.included).join(''));
    }
  });

  it('produces identical output on repeated runs', () => {
    const blocks = ['one\n', 'two\n', 'three\n'];
    expect(assembleDefinition('H\n', blocks, 12)).toEqual(assembleDefinition('H\n', blocks, 12));
  });
});

describe('definitionHeader', () => {
  it('introduces the user', () => {
    expect(definitionHeader('someone')).toBe(
      'This character is based on the Reddit user u/someone. Here are examples of how they typically respond:\n\n',
    );
  });
});
