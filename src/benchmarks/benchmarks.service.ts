import { Inject, Injectable } from "@nestjs/common";
import { AxiosError, isAxiosError, isCancel } from "axios";
import { BaseService } from "@/common/base/base.service";
import type { PriceFeedsWithUpdateData, PriceIdentifier, UnixTimestamp } from "@/types";
import { assembleBenchmarkUpdates } from "./benchmark-updates.assembler";
import { parseBenchmarkUpdates } from "./benchmark-updates.parser";
import { BenchmarksConfigurationError, BenchmarksTransportError } from "./benchmarks.errors";
import {
  BENCHMARKS_CONFIG,
  BENCHMARKS_HTTP_CLIENT,
  BENCHMARKS_UPDATES_ROUTE,
  BlobEncoding,
  type BenchmarksFetchOptions,
  type BenchmarksHttpClient,
  type BenchmarksServiceConfig,
  type IBenchmarksProvider,
} from "./benchmarks.types";

/**
 * Fetches historical price updates for a publish time from the benchmarks provider.
 * Exactly one request per call: no retry, no caching.
 */
@Injectable()
export class BenchmarksService extends BaseService implements IBenchmarksProvider {
  constructor(
    @Inject(BENCHMARKS_CONFIG) private readonly benchmarksConfig: BenchmarksServiceConfig,
    @Inject(BENCHMARKS_HTTP_CLIENT) private readonly httpClient: BenchmarksHttpClient
  ) {
    super();
  }

  async getVerifiedPriceFeeds(
    priceIds: PriceIdentifier[],
    publishTime: UnixTimestamp,
    options: BenchmarksFetchOptions = {}
  ): Promise<PriceFeedsWithUpdateData> {
    const startTime = Date.now();

    try {
      const url = this.buildUpdatesUrl(publishTime);
      const params = this.buildQueryParams(priceIds);

      const body = await this.requestUpdates(url, params, options.signal);
      const result = assembleBenchmarkUpdates(parseBenchmarkUpdates(body));

      this.logPerformance("getVerifiedPriceFeeds", Date.now() - startTime, this.benchmarksConfig.timeoutMs / 2);
      this.logDebug(
        `Fetched ${result.priceFeeds.length} price feeds and ${result.updateData.length} update messages`,
        "getVerifiedPriceFeeds",
        { publishTime, requestedIds: priceIds.length }
      );

      return result;
    } catch (error) {
      if (error instanceof Error) {
        this.logError(error, "getVerifiedPriceFeeds", { publishTime, requestedIds: priceIds.length });
      }
      throw error;
    }
  }

  /**
   * Resolves the updates route against the configured endpoint. The route is
   * absolute, so it replaces any path on the endpoint.
   */
  buildUpdatesUrl(publishTime: UnixTimestamp): string {
    const endpoint = this.benchmarksConfig.endpoint;
    if (!endpoint) {
      throw new BenchmarksConfigurationError("Benchmarks endpoint is not set");
    }
    if (!Number.isSafeInteger(publishTime)) {
      throw new RangeError(`Publish time must be an integer Unix timestamp, got ${publishTime}`);
    }

    try {
      return new URL(`${BENCHMARKS_UPDATES_ROUTE}/${publishTime}`, endpoint).toString();
    } catch (error) {
      throw new BenchmarksConfigurationError(`Benchmarks endpoint "${endpoint}" is not a valid URL`, { endpoint }, {
        cause: error,
      });
    }
  }

  buildQueryParams(priceIds: PriceIdentifier[]): URLSearchParams {
    const params = new URLSearchParams();
    params.append("encoding", BlobEncoding.Hex);
    params.append("parsed", "true");
    for (const priceId of priceIds) {
      params.append("ids", priceId.toHex());
    }
    return params;
  }

  /**
   * The deadline bounds the whole round trip; axios' own timeout only covers socket inactivity.
   */
  private async requestUpdates(url: string, params: URLSearchParams, signal?: AbortSignal): Promise<unknown> {
    const deadline = AbortSignal.timeout(this.benchmarksConfig.timeoutMs);

    try {
      const response = await this.httpClient.get<unknown>(url, {
        params,
        timeout: this.benchmarksConfig.timeoutMs,
        responseType: "json",
        signal: signal ? AbortSignal.any([deadline, signal]) : deadline,
      });
      return response.data;
    } catch (error) {
      const deadlineExceeded = deadline.aborted && !signal?.aborted;
      throw this.toTransportError(error, `${url}?${params.toString()}`, deadlineExceeded);
    }
  }

  private toTransportError(error: unknown, url: string, deadlineExceeded: boolean): BenchmarksTransportError {
    if (deadlineExceeded) {
      return this.timeoutError(url, error);
    }

    if (isCancel(error)) {
      return new BenchmarksTransportError("Benchmarks request was cancelled", { url, cause: error });
    }

    if (isAxiosError(error)) {
      const status = error.response?.status;
      if (status !== undefined) {
        return new BenchmarksTransportError(`Benchmarks request failed with status ${status}`, {
          url,
          status,
          cause: error,
        });
      }

      if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
        return this.timeoutError(url, error);
      }

      return new BenchmarksTransportError(`Benchmarks request failed: ${error.message}`, { url, cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new BenchmarksTransportError(`Benchmarks request failed: ${message}`, { url, cause: error });
  }

  private timeoutError(url: string, cause: unknown): BenchmarksTransportError {
    return new BenchmarksTransportError(`Benchmarks request timed out after ${this.benchmarksConfig.timeoutMs}ms`, {
      url,
      timedOut: true,
      cause,
    });
  }
}
