export class ScraperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class RenderTimeoutError extends ScraperError {
  constructor(
    readonly description: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${description}`);
  }
}

export class ConfigurationError extends ScraperError {}
