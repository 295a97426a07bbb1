export class HaulgradeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Input that leaves nothing to simulate: no samples, no eligible bins, no trips. */
export class LoadError extends HaulgradeError {}

export class ConfigError extends HaulgradeError {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}
