/**
 * Configuration Error
 *
 * Thrown by loadConfig when a required environment variable is missing
 * or a value does not parse. The entry point exits before listening.
 */

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID' as const;

  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}
