/**
 * Production sequence: an ordered grouping of product lines (e.g. slaughter,
 * processing). Members run on independent lines within the facility day.
 */

import { isProductKey } from '../products/value-objects';
import { ConfigurationError } from '../shared/errors';

export interface SequenceDefinition {
  readonly id: string;
  readonly productKeys: readonly string[];
}

export interface CreateSequenceData {
  id: string;
  productKeys: string[];
}

export function createSequence(data: CreateSequenceData): SequenceDefinition {
  if (!data.id || data.id.trim().length === 0) {
    throw new ConfigurationError('Sequence id cannot be empty');
  }
  const invalidKey = data.productKeys.find((key) => !isProductKey(key));
  if (invalidKey !== undefined) {
    throw new ConfigurationError(`Sequence '${data.id}' references an invalid product key '${invalidKey}'`, {
      sequenceId: data.id,
    });
  }

  return Object.freeze({
    id: data.id,
    productKeys: Object.freeze([...data.productKeys]),
  });
}

export function createSequences(data: CreateSequenceData[]): readonly SequenceDefinition[] {
  const seen = new Set<string>();
  const sequences = data.map((entry) => {
    if (seen.has(entry.id)) {
      throw new ConfigurationError(`Duplicate sequence id '${entry.id}'`, { sequenceId: entry.id });
    }
    seen.add(entry.id);
    return createSequence(entry);
  });
  return Object.freeze(sequences);
}

export function findSequence(
  sequences: readonly SequenceDefinition[],
  sequenceId: string
): SequenceDefinition | undefined {
  return sequences.find((sequence) => sequence.id === sequenceId);
}
