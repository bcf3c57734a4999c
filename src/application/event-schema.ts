import { z } from 'zod';

/**
 * User identifiers arrive either as integers or as opaque strings;
 * both are stored as given.
 */
const subjectIdSchema = z.union([
  z.number().int(),
  z.string().min(1).max(255),
]);

/** Body of `POST /api/v1/visits`. */
export const visitSchema = z.object({
  user_id: subjectIdSchema,
  page_url: z.string().min(1).max(2048),
});

export type VisitInput = z.infer<typeof visitSchema>;

/**
 * Body of `POST /api/v1/buys`.
 *
 * `product_quantity` must be a positive integer; anything else is
 * rejected here, before a record is built.
 */
export const buySchema = z.object({
  user_id: subjectIdSchema,
  promotion_id: z.number().int(),
  product_id: z.number().int(),
  product_quantity: z.number().int().positive(),
});

export type BuyInput = z.infer<typeof buySchema>;

/** Bounds for the stats window, in hours. */
export interface WindowBounds {
  readonly minHours: number;
  readonly maxHours: number;
  readonly defaultHours: number;
}

export const DEFAULT_WINDOW_BOUNDS: WindowBounds = {
  minHours: 0.1,
  maxHours: 168, // one week
  defaultHours: 1,
};

/**
 * Builds the querystring schema for `GET /api/v1/stats`.
 * Querystring values are strings, hence the coercion.
 */
export function createStatsQuerySchema(bounds: WindowBounds = DEFAULT_WINDOW_BOUNDS) {
  return z.object({
    timeframe_hours: z.coerce
      .number()
      .finite()
      .min(bounds.minHours)
      .max(bounds.maxHours)
      .default(bounds.defaultHours),
  });
}

export type StatsQuery = z.infer<ReturnType<typeof createStatsQuerySchema>>;

/**
 * Shape of a record as written to a shared backend. Used to validate
 * entries read back, so a corrupt entry fails loudly instead of
 * skewing counts.
 */
const baseRecordShape = {
  subject_id: subjectIdSchema,
  ip_address: z.string(),
  quantity: z.number().int().positive(),
  timestamp: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }),
};

export const eventRecordSchema = z.discriminatedUnion('kind', [
  z.object({
    ...baseRecordShape,
    kind: z.literal('visit'),
    page_url: z.string(),
  }),
  z.object({
    ...baseRecordShape,
    kind: z.literal('buy'),
    promotion_id: z.number().int(),
    product_id: z.number().int(),
  }),
]);
