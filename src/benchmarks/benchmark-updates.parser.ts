import { plainToInstance } from "class-transformer";
import { validateSync, type ValidationError } from "class-validator";
import { PriceIdentifier, type Price, type PriceFeed } from "@/types";
import { BenchmarksSchemaError } from "./benchmarks.errors";
import type { BenchmarkUpdates } from "./benchmarks.types";
import { BenchmarkUpdatesDto, type PriceDto, type PriceFeedDto } from "./dto/benchmark-updates.dto";

/**
 * Flattens nested class-validator errors into "path: message; message" lines
 */
export function formatValidationErrors(errors: ValidationError[], parentPath = ""): string[] {
  return errors.flatMap(error => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = error.constraints ? [`${path}: ${Object.values(error.constraints).join("; ")}`] : [];
    return [...own, ...formatValidationErrors(error.children ?? [], path)];
  });
}

function toPrice(dto: PriceDto): Price {
  return {
    price: BigInt(dto.price),
    conf: BigInt(dto.conf),
    expo: dto.expo,
    publishTime: dto.publish_time,
  };
}

function toPriceFeed(dto: PriceFeedDto): PriceFeed {
  return {
    id: PriceIdentifier.fromHex(dto.id),
    price: toPrice(dto.price),
    emaPrice: toPrice(dto.ema_price),
  };
}

/**
 * Validates a decoded JSON body against the provider schema and maps it to domain types.
 * Unknown keys (such as per-feed metadata) are ignored.
 */
export function parseBenchmarkUpdates(body: unknown): BenchmarkUpdates {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new BenchmarksSchemaError("Benchmarks response body is not a JSON object");
  }

  const dto = plainToInstance(BenchmarkUpdatesDto, body);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const violations = formatValidationErrors(errors);
    throw new BenchmarksSchemaError(`Benchmarks response does not match the expected schema: ${violations.join(", ")}`, violations);
  }

  return {
    parsed: dto.parsed.map(toPriceFeed),
    binary: {
      encoding: dto.binary.encoding,
      data: [...dto.binary.data],
    },
  };
}
