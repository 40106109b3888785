import { MalformedCiphertextError } from '../errors/index.js';
import {
  ciphertextSequenceSchema,
  type Ciphertext,
  type CiphertextSequence,
  type SlotValue,
} from '../schemas/ciphertext.js';

/**
 * Serialize a ciphertext as its values ordered by position
 */
export function ciphertextToSequence(ciphertext: ReadonlyMap<number, SlotValue>): CiphertextSequence {
  const sequence: CiphertextSequence = [];
  for (let position = 0; position < ciphertext.size; position++) {
    const value = ciphertext.get(position);
    if (value === undefined) {
      throw new MalformedCiphertextError(
        `Ciphertext has no value at position ${position}`,
        'serialize',
        { position }
      );
    }
    sequence.push(value);
  }
  return sequence;
}

/**
 * Parse a serialized sequence back into a position-keyed ciphertext
 */
export function ciphertextFromSequence(data: unknown): Ciphertext {
  const parsed = ciphertextSequenceSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedCiphertextError(
      `Ciphertext sequence is malformed: ${issue ? `${issue.path.join('.') || 'sequence'}: ${issue.message}` : 'invalid'}`,
      'deserialize'
    );
  }
  return new Map(parsed.data.map((value, position) => [position, value]));
}
