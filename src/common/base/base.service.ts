import { WithLogging } from "./mixins/logging.mixin";
import type { IBaseService } from "../types/services/base.types";

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {
    // Empty constructor
  }
}

/**
 * Base service class; all logging methods come from the WithLogging mixin
 */
export abstract class BaseService extends WithLogging(SimpleBase) implements IBaseService {}
