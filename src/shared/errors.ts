export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MonitorError';
  }
}

/** A single data source could not be read this run. */
export class FetchError extends MonitorError {
  public readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`[${source}] ${message}`, options);
    this.name = 'FetchError';
    this.source = source;
  }
}

export class HistoryLoadError extends MonitorError {
  public readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot load history from ${filePath}: ${message}`, options);
    this.name = 'HistoryLoadError';
    this.filePath = filePath;
  }
}

export class RenderError extends MonitorError {
  public readonly indicatorId: string;

  constructor(indicatorId: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot render chart for ${indicatorId}: ${message}`, options);
    this.name = 'RenderError';
    this.indicatorId = indicatorId;
  }
}

export class NotifyError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotifyError';
  }
}

export class ConfigError extends MonitorError {
  public readonly violations: readonly string[];

  constructor(violations: readonly string[]) {
    super(`Invalid configuration: ${violations.join('; ')}`);
    this.name = 'ConfigError';
    this.violations = violations;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
