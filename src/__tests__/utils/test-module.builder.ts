import { Test, type TestingModule } from "@nestjs/testing";
import type { DynamicModule, INestApplication, Provider, Type } from "@nestjs/common";
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";

type ProviderToken = string | symbol | Type<unknown>;

/**
 * Test module builder utility to reduce boilerplate in test files
 */
export class TestModuleBuilder {
  private providers: Provider[] = [];
  private controllers: Type<unknown>[] = [];
  private imports: Array<Type<unknown> | DynamicModule> = [];
  private overrides: Array<{ token: ProviderToken; value: unknown }> = [];

  /**
   * Register a stand-in value for a token
   */
  addMock(token: ProviderToken, value: unknown): TestModuleBuilder {
    this.providers.push({ provide: token, useValue: value });
    return this;
  }

  addController(controller: Type<unknown>): TestModuleBuilder {
    this.controllers.push(controller);
    return this;
  }

  addImport(module: Type<unknown> | DynamicModule): TestModuleBuilder {
    this.imports.push(module);
    return this;
  }

  /**
   * Replace a provider coming from an imported module
   */
  override(token: ProviderToken, value: unknown): TestModuleBuilder {
    this.overrides.push({ token, value });
    return this;
  }

  async build(): Promise<TestingModule> {
    let builder = Test.createTestingModule({
      imports: this.imports,
      controllers: this.controllers,
      providers: this.providers,
    });

    for (const { token, value } of this.overrides) {
      builder = builder.overrideProvider(token).useValue(value);
    }

    return builder.compile();
  }

  /**
   * Build and start an in-process HTTP application wired like the real one
   */
  async buildApp(): Promise<INestApplication> {
    const module = await this.build();
    const app = module.createNestApplication({ logger: false });
    app.useGlobalFilters(new HttpExceptionFilter());
    await app.init();
    return app;
  }
}

export function createTestModule(): TestModuleBuilder {
  return new TestModuleBuilder();
}
