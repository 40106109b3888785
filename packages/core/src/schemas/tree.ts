import { z } from 'zod';

// Node identifiers are non-negative safe integers so numeric sort is total
export const nodeId = z
  .number()
  .int('Node identifier must be an integer')
  .nonnegative('Node identifier cannot be negative')
  .max(Number.MAX_SAFE_INTEGER, 'Node identifier must be a safe integer');

// Adjacency keys arrive as strings once JSON has been through a wire
export const nodeIdKey = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, 'Adjacency key must be a canonical non-negative integer')
  .transform((key) => Number(key))
  .pipe(nodeId);

/**
 * Serialized tree exchanged between the encrypting and decrypting parties.
 * Data slots are never part of it.
 */
export const serializedTreeSchema = z.object({
  root: nodeId,
  adjacency: z.record(z.string(), z.array(nodeId)),
});

export type SerializedTree = z.infer<typeof serializedTreeSchema>;
export type NodeId = z.infer<typeof nodeId>;
