import { Module } from "@nestjs/common";
import { BenchmarksModule } from "@/benchmarks/benchmarks.module";
import { ConfigModule } from "@/config/config.module";

@Module({
  imports: [ConfigModule, BenchmarksModule],
})
export class AppModule {}
