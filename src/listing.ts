/**
 * Bucket Listing
 *
 * Schema for the JSON written by `aws s3api list-object-versions`.
 */

import { z } from 'zod';
import { readJsonFile } from './utils/read-json.js';

export const ObjectVersionSchema = z.object({
  Key: z.string().min(1),
  LastModified: z.string(),
  Size: z.number().nonnegative(),
  IsLatest: z.boolean(),
  VersionId: z.string().optional(),
});

export const DeleteMarkerSchema = z.object({
  Key: z.string().min(1),
  LastModified: z.string(),
  IsLatest: z.boolean().optional(),
  VersionId: z.string().optional(),
});

export const ListingSchema = z.object({
  // The CLI leaves either array out when the bucket has none
  Versions: z.array(ObjectVersionSchema).default([]),
  DeleteMarkers: z.array(DeleteMarkerSchema).default([]),
});

export type ObjectVersion = z.infer<typeof ObjectVersionSchema>;
export type DeleteMarker = z.infer<typeof DeleteMarkerSchema>;
export type Listing = z.infer<typeof ListingSchema>;

export function parseListing(data: unknown, source = 'listing'): Listing {
  const parsed = ListingSchema.safeParse(data);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid bucket listing in ${source}: ${problems}`);
  }
  return parsed.data;
}

export async function loadListing(filepath: string): Promise<Listing> {
  return parseListing(await readJsonFile(filepath), filepath);
}
