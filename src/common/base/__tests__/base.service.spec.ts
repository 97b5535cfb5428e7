import { Logger } from "@nestjs/common";
import { BaseService } from "../base.service";

class TestService extends BaseService {}

describe("BaseService", () => {
  let service: TestService;
  let warnSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    service = new TestService();
    warnSpy = jest.spyOn(Logger.prototype, "warn").mockImplementation();
    debugSpy = jest.spyOn(Logger.prototype, "debug").mockImplementation();
    errorSpy = jest.spyOn(Logger.prototype, "error").mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should name its logger after the concrete class", () => {
    expect(service.logger).toBeInstanceOf(Logger);
    expect(service.logger["context"]).toBe("TestService");
  });

  describe("logPerformance", () => {
    it("should warn when the threshold is exceeded", () => {
      service.logPerformance("fetch", 1500);
      expect(warnSpy).toHaveBeenCalledWith("Performance warning: fetch took 1500ms (threshold: 1000ms)");
    });

    it("should log at debug level otherwise", () => {
      service.logPerformance("fetch", 20, 100);
      expect(debugSpy).toHaveBeenCalledWith("fetch completed in 20ms");
      expect(warnSpy).not.toHaveBeenCalled();
    });
  });

  it("should prefix errors with their context", () => {
    const error = new Error("request failed");
    service.logError(error, "getVerifiedPriceFeeds", { publishTime: 1 });

    expect(errorSpy).toHaveBeenCalledWith("[getVerifiedPriceFeeds] request failed", error.stack, { publishTime: 1 });
  });

  it("should log warnings and debug lines with context", () => {
    service.logWarning("slow reply", "fetch");
    service.logDebug("done");

    expect(warnSpy).toHaveBeenCalledWith("[fetch] slow reply", undefined);
    expect(debugSpy).toHaveBeenCalledWith("done", undefined);
  });
});
