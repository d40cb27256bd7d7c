/**
 * Catalog types - the listing endpoint's response shape
 */

import { z } from "zod";

export const HouseSchema = z.object({
  id: z.number().int(),
  address: z.string(),
  homeowner: z.string(),
  price: z.number().int(),
  photoURL: z.string().url(),
});

export const PageSchema = z.object({
  houses: z.array(HouseSchema),
  ok: z.boolean(),
});

export type House = Readonly<z.infer<typeof HouseSchema>>;

export interface Page {
  readonly houses: readonly House[];
  readonly ok: boolean;
}

/**
 * Message a download worker sends to its page worker once it is finished.
 * "failed" only occurs under a bounded retry policy.
 */
export type CompletionSignal =
  | { status: "downloaded"; path: string }
  | { status: "failed" };

/**
 * Advisory progress update, consumed only by the progress aggregator
 */
export interface ProgressEvent {
  page: number;
  total: number;
  current: number;
}

export interface PageResult {
  page: number;
  // false when a bounded retry policy gave up on the listing request
  fetched: boolean;
  total: number;
  downloaded: number;
  failed: number;
}

export interface RunSummary {
  pages: PageResult[];
  downloaded: number;
  failed: number;
  failedPages: number;
}
