export { TestModuleBuilder, createTestModule } from "./test-module.builder";
export { TestDataBuilder, TEST_FEED_ID, TEST_PUBLISH_TIME } from "./test-data.builders";
