import type { Logger } from "@nestjs/common";
import type { LoggingCapabilities } from "../../base/mixins/logging.mixin";

/**
 * Minimal public interface shared by every service
 */
export interface IBaseService extends LoggingCapabilities {
  readonly logger: Logger;
}
