import { describe, it, expect } from 'vitest';
import { createSequence, createSequences, findSequence } from '../sequence';
import { ConfigurationError } from '../../shared/errors';

describe('createSequence', () => {
  it('freezes a copy of the product order', () => {
    const keys = ['beef', 'pork'];

    const sequence = createSequence({ id: 'slaughter', productKeys: keys });
    keys.push('lamb');

    expect(sequence.productKeys).toEqual(['beef', 'pork']);
    expect(Object.isFrozen(sequence.productKeys)).toBe(true);
  });

  it('rejects malformed definitions', () => {
    expect(() => createSequence({ id: ' ', productKeys: ['beef'] })).toThrow(ConfigurationError);
    expect(() => createSequence({ id: 'blank', productKeys: ['beef', ''] })).toThrow(ConfigurationError);
    expect(() => createSequence({ id: 'padded', productKeys: [' beef'] })).toThrow(
      "Sequence 'padded' references an invalid product key ' beef'"
    );
  });

  it('accepts a sequence with no products yet', () => {
    expect(createSequence({ id: 'future', productKeys: [] }).productKeys).toEqual([]);
  });

  it('rejects duplicate ids', () => {
    const entry = { id: 'slaughter', productKeys: ['beef'] };

    expect(() => createSequences([entry, entry])).toThrow("Duplicate sequence id 'slaughter'");
  });
});

describe('findSequence', () => {
  it('finds by id', () => {
    const sequences = createSequences([
      { id: 'slaughter', productKeys: ['beef'] },
      { id: 'processing', productKeys: ['cheese'] },
    ]);

    expect(findSequence(sequences, 'processing')?.productKeys).toEqual(['cheese']);
    expect(findSequence(sequences, 'smokehouse')).toBeUndefined();
  });
});
