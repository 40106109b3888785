import { z } from 'zod';

/** A data slot value: a safe integer, or `null` for an unassigned node */
export const slotValue = z.number().int().safe().nullable();

export const plaintextSchema = z.array(z.number().int().safe());

/** Ciphertext serialized as values ordered by BFS position */
export const ciphertextSequenceSchema = z.array(slotValue);

export type SlotValue = z.infer<typeof slotValue>;
export type Plaintext = z.infer<typeof plaintextSchema>;
export type CiphertextSequence = z.infer<typeof ciphertextSequenceSchema>;

/** Ciphertext keyed by BFS position */
export type Ciphertext = Map<number, SlotValue>;
