export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[], context = 'Invalid match configuration') {
    super(`${context}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
