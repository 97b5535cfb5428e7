import { Logger } from "@nestjs/common";
import { enabledLogLevels, shouldLog } from "../../types/logging";
import { FilteredLogger } from "../filtered-logger";

describe("log level filtering", () => {
  it("should order levels from most to least severe", () => {
    expect(shouldLog("error", "warn")).toBe(true);
    expect(shouldLog("debug", "log")).toBe(false);
    expect(shouldLog("fatal", "fatal")).toBe(true);
  });

  it("should list the levels enabled for a threshold", () => {
    expect(enabledLogLevels("warn")).toEqual(["fatal", "error", "warn"]);
    expect(enabledLogLevels("verbose")).toEqual(["fatal", "error", "warn", "log", "debug", "verbose"]);
  });
});

describe("FilteredLogger", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(Logger.prototype, "log").mockImplementation();
    warnSpy = jest.spyOn(Logger.prototype, "warn").mockImplementation();
    debugSpy = jest.spyOn(Logger.prototype, "debug").mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should drop messages below the configured level", () => {
    const logger = new FilteredLogger("Bootstrap", "warn");

    logger.log("listening");
    logger.debug("details");
    logger.warn("endpoint missing");

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith("endpoint missing");
  });

  it("should default to the log level", () => {
    const logger = new FilteredLogger("Bootstrap");

    logger.log("listening");
    logger.debug("details");

    expect(logSpy).toHaveBeenCalledWith("listening");
    expect(debugSpy).not.toHaveBeenCalled();
  });
});
