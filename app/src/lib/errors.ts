export class DatasetParseError extends Error {
  details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = "DatasetParseError";
    this.details = details;
  }
}

export class ConfigError extends Error {
  details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = "ConfigError";
    this.details = details;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
