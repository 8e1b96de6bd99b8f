/**
 * Startup configuration is unusable
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = [],
  ) {
    super(problems.length > 0 ? `${message}:\n  - ${problems.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
  }
}
