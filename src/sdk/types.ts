// Gateway wire format: Zod schemas shared by the HTTP routes and GatewayClient.

import { z } from 'zod';

import type { Entry, Metadata } from '../storage/index.js';

// ---------------------------------------------------------------------------
// POST /operators
// ---------------------------------------------------------------------------

export const OpenOperatorRequestSchema = z.object({
  scheme: z.string(),
  config: z.record(z.string(), z.string()).default({}),
});

export const CapabilitiesSchema = z.object({
  list: z.boolean(),
  copy: z.boolean(),
  rename: z.boolean(),
  createDir: z.boolean(),
});

export const OpenOperatorResponseSchema = z.object({
  /** Token naming the operator in every later request */
  handle: z.string().uuid(),
  scheme: z.string(),
  capabilities: CapabilitiesSchema,
});

export type OpenOperatorRequest = z.input<typeof OpenOperatorRequestSchema>;
export type OpenOperatorResponse = z.infer<typeof OpenOperatorResponseSchema>;

// ---------------------------------------------------------------------------
// stat / list
// ---------------------------------------------------------------------------

/** Metadata with lastModified as an ISO-8601 string */
export const StatResponseSchema = z.object({
  mode: z.enum(['file', 'dir']),
  contentLength: z.number().int().nonnegative(),
  lastModified: z.string().nullable(),
  contentType: z.string().optional(),
  etag: z.string().optional(),
});

export const ListResponseSchema = z.object({
  entries: z.array(z.object({ path: z.string(), metadata: StatResponseSchema })),
});

export type StatResponse = z.infer<typeof StatResponseSchema>;
export type ListResponse = z.infer<typeof ListResponseSchema>;

export function toStatResponse(metadata: Metadata): StatResponse {
  return {
    mode: metadata.mode,
    contentLength: metadata.contentLength,
    lastModified: metadata.lastModified ? metadata.lastModified.toISOString() : null,
    ...(metadata.contentType !== undefined && { contentType: metadata.contentType }),
    ...(metadata.etag !== undefined && { etag: metadata.etag }),
  };
}

export function fromStatResponse(response: StatResponse): Metadata {
  return {
    mode: response.mode,
    contentLength: response.contentLength,
    lastModified: response.lastModified === null ? null : new Date(response.lastModified),
    ...(response.contentType !== undefined && { contentType: response.contentType }),
    ...(response.etag !== undefined && { etag: response.etag }),
  };
}

export function fromListResponse(response: ListResponse): Entry[] {
  return response.entries.map((entry) => ({
    path: entry.path,
    metadata: fromStatResponse(entry.metadata),
  }));
}

// ---------------------------------------------------------------------------
// GET /schemes, GET /health
// ---------------------------------------------------------------------------

export const SchemesResponseSchema = z.object({
  schemes: z.array(z.string()),
});

export const HealthResponseSchema = z.object({
  status: z.literal('healthy'),
  timestamp: z.string(),
  version: z.string(),
  uptime: z.number(),
  handles: z.number().int().nonnegative(),
  schemes: z.array(z.string()),
});

export type SchemesResponse = z.infer<typeof SchemesResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

// ---------------------------------------------------------------------------
// Error body (written by the error-handler plugin)
// ---------------------------------------------------------------------------

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    statusCode: z.number(),
    stack: z.string().optional(),
  }),
  requestId: z.string(),
  timestamp: z.string(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
