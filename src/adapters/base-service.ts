import { logger as defaultLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

type ServiceLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/** Logger plumbing shared by the adapters; a custom logger can be injected for tests. */
export class BaseService {
  protected logger?: Logger;

  setLogger(logger: Logger) { this.logger = logger; }
  dispose() { this.logger = undefined; }

  log(level: ServiceLevel, message: string, meta?: unknown) {
    const lg = this.logger ?? defaultLogger;
    switch (level) {
      case 'DEBUG': return lg.debug(message, meta);
      case 'INFO': return lg.info(message, meta);
      case 'WARN': return lg.warn(message, meta);
      case 'ERROR': return lg.error(message, meta);
    }
  }

  /** Category log; falls back to the plain level methods for loggers without `log`. */
  clog(category: string, level: ServiceLevel, message: string, meta?: unknown) {
    const lg = this.logger ?? defaultLogger;
    if (lg.log) return lg.log(level, category, message, meta);
    return this.log(level, message, meta);
  }
}

export default BaseService;
