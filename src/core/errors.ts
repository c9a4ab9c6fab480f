export class SnapshotError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'SnapshotError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath?: string) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class AnalysisCancelledError extends Error {
  constructor(compilation: string) {
    super(`Analysis of '${compilation}' was cancelled`);
    this.name = 'AnalysisCancelledError';
  }
}
