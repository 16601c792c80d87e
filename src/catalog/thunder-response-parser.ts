// ---------------------------------------------------------------------------
// Thunder (OverDrive / Libby) media search response parsing.
//
// Validates the envelope with Zod and maps each item onto a CatalogEntry.
// Only the `items` array is required; every item field is optional and
// falls back to an empty / zero / false value, also when it has the wrong
// type.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { CatalogEntry, CatalogSearchResult } from "../core/types.js";
import { ParseError } from "../core/errors.js";

/**
 * Shape of a single media item (subset we care about). A field of the wrong
 * type reads as missing, and an item that is not an object reads as null.
 */
const ThunderCreatorSchema = z
  .object({
    name: z.string().nullish().catch(null),
    role: z.string().nullish().catch(null),
  })
  .catch({});

const ThunderMediaItemSchema = z.object({
  id: z.union([z.string(), z.number()]).optional().catch(undefined),
  title: z.string().nullish().catch(null),
  firstCreatorName: z.string().nullish().catch(null),
  creators: z.array(ThunderCreatorSchema).nullish().catch(null),
  type: z
    .object({
      id: z.string().nullish().catch(null),
      name: z.string().nullish().catch(null),
    })
    .nullish()
    .catch(null),
  ownedCopies: z.number().nullish().catch(null),
  availableCopies: z.number().nullish().catch(null),
  isOwned: z.boolean().nullish().catch(null),
  isAvailable: z.boolean().nullish().catch(null),
});

/** Shape of the media search envelope. Only `items` is required. */
const ThunderSearchResponseSchema = z.object({
  totalItems: z.number().nullish().catch(null),
  items: z.array(ThunderMediaItemSchema.nullable().catch(null)),
});

export type ThunderMediaItem = z.infer<typeof ThunderMediaItemSchema>;

function toCatalogEntry(item: ThunderMediaItem): CatalogEntry {
  const author =
    item.firstCreatorName ||
    item.creators?.find((c) => c.name)?.name ||
    "";

  return {
    id: item.id === undefined ? "" : String(item.id),
    title: item.title ?? "",
    author,
    format: item.type?.name ?? "",
    copiesOwned: item.ownedCopies ?? 0,
    copiesAvailable: item.availableCopies ?? 0,
    isOwned: item.isOwned ?? false,
    isAvailable: item.isAvailable ?? false,
  };
}

/**
 * Parse a raw response body into a {@link CatalogSearchResult}.
 *
 * Items that are not objects are skipped.
 *
 * @throws ParseError when the body is not JSON or has no `items` array.
 */
export function parseSearchResponse(body: string): CatalogSearchResult {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ParseError("Catalog response is not valid JSON", { cause: err });
  }

  const result = ThunderSearchResponseSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "root";
    throw new ParseError(
      `Unexpected catalog response shape at ${where}: ${issue?.message ?? "unknown error"}`,
      { cause: result.error },
    );
  }

  const entries = result.data.items
    .filter((item): item is ThunderMediaItem => item !== null)
    .map(toCatalogEntry);
  return {
    totalItems: result.data.totalItems ?? entries.length,
    entries,
  };
}
