/**
 * @module config-service
 *
 * Process-wide configuration, read from the environment once.
 *
 * | Variable | Effect | Default |
 * |---|---|---|
 * | `LOG_LEVEL` | minimum level of {@link Logger} output | `INFO` |
 * | `STENCIL_IR_PROTO_DIR` | directory holding the `.proto` wire schema | the package's `proto/` |
 * | `STENCIL_IR_VALIDATE_ON_ENCODE` | `1` runs `validate()` before every encode | off |
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * if (ConfigService.getInstance().validateOnEncode) {
 *   instantiation.validate();
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

export class ConfigService {
  private static instance: ConfigService | null = null;

  /** Minimum log level (default INFO). */
  readonly logLevel: LogLevel;

  /** Override for the schema directory; `null` means the bundled `proto/` directory. */
  readonly protoDir: string | null;

  /** Validate every instantiation before encoding it. */
  readonly validateOnEncode: boolean;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.protoDir = process.env.STENCIL_IR_PROTO_DIR || null;
    this.validateOnEncode = process.env.STENCIL_IR_VALIDATE_ON_ENCODE === '1';
  }

  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * Drops the cached instance so the next {@link getInstance} re-reads the environment.
   * Tests only.
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
