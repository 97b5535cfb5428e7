import type { AxiosInstance } from "axios";
import type { PriceFeed, PriceFeedsWithUpdateData, PriceIdentifier, UnixTimestamp } from "@/types";

export const BENCHMARKS_PROVIDER = "BENCHMARKS_PROVIDER";
export const BENCHMARKS_HTTP_CLIENT = "BENCHMARKS_HTTP_CLIENT";
export const BENCHMARKS_CONFIG = "BENCHMARKS_CONFIG";

export const BENCHMARKS_REQUEST_TIMEOUT_MS = 30_000;
export const BENCHMARKS_UPDATES_ROUTE = "/v1/updates/price";

/**
 * Transport encoding of the strings in a binary blob
 */
export enum BlobEncoding {
  Base64 = "base64",
  Hex = "hex",
}

/**
 * Ordered, transport-encoded update messages. Every item uses the same encoding.
 */
export interface BinaryBlob {
  encoding: BlobEncoding;
  data: string[];
}

/**
 * Provider reply for one publish time: parsed feeds plus the signed updates behind them
 */
export interface BenchmarkUpdates {
  parsed: PriceFeed[];
  binary: BinaryBlob;
}

export interface BenchmarksFetchOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Fetches verified historical price feeds
 */
export interface IBenchmarksProvider {
  getVerifiedPriceFeeds(
    priceIds: PriceIdentifier[],
    publishTime: UnixTimestamp,
    options?: BenchmarksFetchOptions
  ): Promise<PriceFeedsWithUpdateData>;
}

export interface BenchmarksServiceConfig {
  /** Base URL of the provider; unset means fetching is unavailable */
  endpoint: string | undefined;
  timeoutMs: number;
}

/** The slice of axios the fetcher relies on */
export type BenchmarksHttpClient = Pick<AxiosInstance, "get">;
