import { z } from 'zod';

/** A single search hit. Only the stored document is read. */
export const searchHitSchema = z.object({
  _source: z.record(z.unknown()),
});

/** Body of an opening search or scroll continuation response. */
export const searchResponseSchema = z.object({
  _scroll_id: z.string().min(1),
  hits: z.object({
    hits: z.array(searchHitSchema),
  }),
});

/** Body of a health check response; which field must be present is decided by the caller. */
export const healthResponseSchema = z.record(z.unknown());

export type SearchHit = z.infer<typeof searchHitSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;
