import { ConfigurationError } from "./errors";

/**
 * The `x-key` secret. Only {@link ApiKey.from} creates one, so an instance is
 * never empty.
 */
export class ApiKey {
  private constructor(private readonly secret: string) {}

  static from(value: string | undefined): ApiKey {
    if (!value) {
      throw new ConfigurationError("API key is missing");
    }
    return new ApiKey(value);
  }

  get value(): string {
    return this.secret;
  }

  matches(candidate: string | undefined): boolean {
    return candidate === this.secret;
  }

  toJSON(): string {
    return "[redacted]";
  }

  toString(): string {
    return "[redacted]";
  }
}
