/**
 * A chat-completion body that does not have the shape the filter expects.
 * The proxy forwards such requests unmodified instead of rejecting them.
 */
export class InvalidRequestError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }
}

export class ConfigError extends Error {
  readonly configPath?: string;

  constructor(message: string, configPath?: string) {
    super(message);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

/** The upstream Ollama server could not be reached at all. */
export class UpstreamError extends Error {
  readonly upstreamUrl: string;
  readonly code?: string;

  constructor(message: string, upstreamUrl: string, code?: string) {
    super(message);
    this.name = 'UpstreamError';
    this.upstreamUrl = upstreamUrl;
    this.code = code;
  }
}
