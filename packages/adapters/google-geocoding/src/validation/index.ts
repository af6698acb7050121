/**
 * Google Geocoding API response schemas
 * Only the fields the adapter reads are declared; the rest pass through untouched.
 */

import { z } from 'zod';

export const AddressComponentSchema = z.object({
  long_name: z.string(),
  short_name: z.string(),
  types: z.array(z.string()),
});

export const LocationTypeSchema = z.enum(['ROOFTOP', 'RANGE_INTERPOLATED', 'GEOMETRIC_CENTER', 'APPROXIMATE']);

export const GeocodeResultSchema = z.object({
  address_components: z.array(AddressComponentSchema),
  formatted_address: z.string().optional(),
  geometry: z
    .object({
      location_type: LocationTypeSchema.optional(),
    })
    .optional(),
  partial_match: z.boolean().optional(),
  place_id: z.string().optional(),
  types: z.array(z.string()).optional(),
});

export const GeocodeResponseSchema = z.object({
  status: z.string(),
  results: z.array(GeocodeResultSchema).default([]),
  error_message: z.string().optional(),
});

export type GoogleAddressComponent = z.infer<typeof AddressComponentSchema>;
export type GoogleGeocodeResult = z.infer<typeof GeocodeResultSchema>;
export type GoogleGeocodeResponse = z.infer<typeof GeocodeResponseSchema>;

export function safeValidateGeocodeResponse(body: unknown) {
  return GeocodeResponseSchema.safeParse(body);
}

export const GoogleGeocodingOptionsSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  baseUrl: z.url().optional(),
  language: z.string().min(2).optional(),
  region: z.string().length(2).optional(),
});
