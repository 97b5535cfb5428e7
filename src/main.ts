import * as dotenv from "dotenv";
dotenv.config();

import "reflect-metadata";
import helmet from "helmet";
import { NestFactory } from "@nestjs/core";
import { ValidationPipe, type INestApplication } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule, type SwaggerDocumentOptions } from "@nestjs/swagger";
import { AppModule } from "@/app.module";
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { enabledLogLevels } from "@/common/types/logging";
import { ConfigService } from "@/config/config.service";
import { ENV, ENV_HELPERS } from "@/config/environment.constants";

const logger = new FilteredLogger("Bootstrap", ENV.LOGGING.LOG_LEVEL);

function setupSwaggerDocumentation(app: INestApplication, basePath: string): void {
  const config = new DocumentBuilder()
    .setTitle("Historical Price Updates API")
    .setDescription("Verified price updates for a past publish time, fetched from the benchmarks provider")
    .setVersion("1.0.0")
    .addTag("Historical Price Updates", "Signed price update messages and parsed feeds at a publish time")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(app, config, options);
  SwaggerModule.setup(`${basePath}/api-doc`, app, document);
  logger.log("API documentation configured");
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    logger: enabledLogLevels(ENV.LOGGING.LOG_LEVEL),
  });

  const validation = app.get(ConfigService).validateConfiguration();
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (!validation.isValid) {
    throw new Error(`Invalid configuration: ${validation.errors.join("; ")}`);
  }

  app.use(helmet());
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      disableErrorMessages: ENV_HELPERS.isProduction(),
    })
  );
  app.useGlobalFilters(new HttpExceptionFilter());

  const basePath = ENV.APPLICATION.BASE_PATH;
  if (ENV.APPLICATION.ENABLE_API_DOCS) {
    setupSwaggerDocumentation(app, basePath);
  }
  app.setGlobalPrefix(basePath);
  app.enableShutdownHooks();

  await app.listen(ENV.APPLICATION.PORT, "0.0.0.0");
  logger.log(`Listening on port ${ENV.APPLICATION.PORT} (${ENV.APPLICATION.NODE_ENV})`);
}

bootstrap().catch((error: unknown) => {
  logger.fatal("Failed to start application", error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
