/**
 * Local site types
 */

import { z } from 'zod';

/**
 * Local site as returned by the remote collection. Only `id` and `url`
 * are required; anything else is passed on unchanged.
 */
export const LocalSiteSchema = z
  .object({
    id: z.string().min(1),
    url: z.string(),
    tags: z.array(z.string()).nullish(),
    categoryId: z.number().int().nullish(),
    comment: z.string().nullish(),
  })
  .passthrough();

export type LocalSite = z.infer<typeof LocalSiteSchema>;

/**
 * One page of the remote collection. Older deployments answer with
 * `data` instead of `items`.
 */
export const LocalSitesPageSchema = z
  .object({
    items: z.array(LocalSiteSchema).nullish(),
    data: z.array(LocalSiteSchema).nullish(),
    pages: z
      .object({
        current: z.number().int().nullish(),
        size: z.number().int().nullish(),
        total: z.number().int().nonnegative().nullish(),
        items: z.number().int().nullish(),
        maxSize: z.number().int().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type LocalSitesPage = z.infer<typeof LocalSitesPageSchema>;

/**
 * Site creation request
 */
export interface CreateLocalSiteInput {
  url: string;
  tags?: string[];
  categoryId?: number;
  comment?: string;
}

/**
 * List options
 */
export interface ListOptions {
  all: boolean; // fetch every page
  page: number; // page to fetch when `all` is false
  pageTotal: boolean; // ask upstream for the total page count
}

export interface ListResult {
  items: LocalSite[];
  totalPages?: number;
}

export interface DeleteResult {
  ok: true;
}
