import { Module } from "@nestjs/common";
import axios from "axios";
import { ConfigModule } from "@/config/config.module";
import { ConfigService } from "@/config/config.service";
import { PriceUpdatesController } from "@/controllers/price-updates.controller";
import { BenchmarksService } from "./benchmarks.service";
import {
  BENCHMARKS_CONFIG,
  BENCHMARKS_HTTP_CLIENT,
  BENCHMARKS_PROVIDER,
  BENCHMARKS_REQUEST_TIMEOUT_MS,
  type BenchmarksHttpClient,
  type BenchmarksServiceConfig,
} from "./benchmarks.types";

@Module({
  imports: [ConfigModule],
  controllers: [PriceUpdatesController],
  providers: [
    {
      provide: BENCHMARKS_CONFIG,
      useFactory: (configService: ConfigService): BenchmarksServiceConfig => ({
        endpoint: configService.getBenchmarksEndpoint(),
        timeoutMs: BENCHMARKS_REQUEST_TIMEOUT_MS,
      }),
      inject: [ConfigService],
    },
    {
      provide: BENCHMARKS_HTTP_CLIENT,
      useFactory: (): BenchmarksHttpClient => axios.create({ headers: { Accept: "application/json" } }),
    },
    BenchmarksService,
    {
      provide: BENCHMARKS_PROVIDER,
      useExisting: BenchmarksService,
    },
  ],
  exports: [BENCHMARKS_PROVIDER],
})
export class BenchmarksModule {}
