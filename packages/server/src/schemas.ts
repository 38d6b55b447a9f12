// Fleet Duel - Request Schemas

import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

// =============================================================================
// HTTP Bodies and Queries
// =============================================================================

export const createGameSchema = z.object({
  gameId: z
    .string()
    .min(1)
    .max(32, 'gameId must be 32 characters or less')
    .regex(/^[A-Za-z0-9_-]+$/, 'gameId may only contain letters, digits, "-" and "_"')
    .optional(),
  seed: z
    .string()
    .regex(/^(0x)?[0-9a-fA-F]{64}$/, 'seed must be 64 hex characters')
    .optional(),
  playerShipsCsv: z.string().min(1).optional(),
});

export const placeShipSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
});

export const fireShotSchema = z.object({
  target: z.string().min(1),
});

const sideSchema = z.enum(['player', 'bot']);

export const boardQuerySchema = z.object({
  view: sideSchema.default('player'),
  format: z.enum(['json', 'text']).default('json'),
});

export const shipsCsvQuerySchema = z.object({
  owner: sideSchema.default('player'),
});

// =============================================================================
// WebSocket Messages
// =============================================================================

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), gameId: z.string().min(1) }),
  z.object({ type: z.literal('unsubscribe'), gameId: z.string().min(1) }),
]);

export type WSClientMessage = z.infer<typeof clientMessageSchema>;

// =============================================================================
// Parsing
// =============================================================================

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; message: string };

/**
 * Validates untrusted input, formatting any failure as one readable line.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown
): ParseResult<z.infer<T>> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return { success: false, message: fromZodError(result.error).message };
  }
  return { success: true, data: result.data };
}
