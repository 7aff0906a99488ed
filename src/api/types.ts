/**
 * Zod schemas for the GitHub REST payloads the store consumes. Only the fields
 * that are read are declared; everything else GitHub sends is stripped.
 */

import { z } from "zod";

export const SearchRepoSchema = z.object({
  id: z.number(),
  name: z.string(),
  owner: z.object({ login: z.string() }),
  description: z.string().nullable().optional().transform((d) => d ?? ""),
  topics: z.array(z.string()).optional().default([]),
  updated_at: z.string(),
  stargazers_count: z.number().optional().default(0),
  html_url: z.string().optional(),
  default_branch: z.string().optional(),
});
export type SearchRepo = z.infer<typeof SearchRepoSchema>;

export const SearchResponseSchema = z.object({
  total_count: z.number().optional(),
  items: z.array(SearchRepoSchema).default([]),
});

export const ContentEntrySchema = z.object({
  name: z.string(),
  path: z.string().optional(),
  type: z.string(),
  download_url: z.string().nullable().optional(),
  size: z.number().optional().default(0),
  sha: z.string().optional(),
  content: z.string().optional(),
  encoding: z.string().optional(),
});
export type ContentEntry = z.infer<typeof ContentEntrySchema>;

/** `contents` answers a file path with one object and a directory with a list. */
export const ContentsResponseSchema = z
  .union([z.array(ContentEntrySchema), ContentEntrySchema])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const ReleaseAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string(),
});
export type ReleaseAsset = z.infer<typeof ReleaseAssetSchema>;

export const ReleaseSchema = z.object({
  tag_name: z.string().nullable().optional().transform((t) => t ?? ""),
  name: z.string().nullable().optional().transform((n) => n ?? ""),
  published_at: z.string().nullable().optional().transform((p) => p ?? ""),
  body: z.string().nullable().optional().transform((b) => b ?? ""),
  html_url: z.string().optional().default(""),
  assets: z.array(ReleaseAssetSchema).optional().default([]),
});
export type Release = z.infer<typeof ReleaseSchema>;

export const CommitSchema = z.object({
  sha: z.string(),
  commit: z.object({
    committer: z.object({ date: z.string() }).nullable(),
  }),
});
export const CommitListSchema = z.array(CommitSchema);

export interface CommitSummary {
  latestSha: string;
  latestDate: string;
  count: number;
}
