import { ConfigService } from "@nestjs/config";

/**
 * Error thrown when an environment setting cannot be parsed
 */
export class InvalidConfigurationError extends Error {
  constructor(
    public readonly key: string,
    value: unknown,
    expected: string,
  ) {
    super(`Invalid value for ${key}: "${String(value)}" (expected ${expected})`);
    this.name = "InvalidConfigurationError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidConfigurationError);
    }
  }
}

function readRaw(
  configService: ConfigService,
  key: string,
): string | number | boolean | undefined {
  const raw = configService.get<string | number | boolean>(key);
  return raw === "" ? undefined : raw;
}

export function readPositiveInteger(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = readRaw(configService, key);
  if (raw === undefined) {
    return fallback;
  }
  const value = typeof raw === "number" ? raw : Number(String(raw).trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigurationError(key, raw, "a positive integer");
  }
  return value;
}

export function readBoolean(
  configService: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = readRaw(configService, key);
  if (raw === undefined) {
    return fallback;
  }
  if (typeof raw === "boolean") {
    return raw;
  }
  switch (String(raw).trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new InvalidConfigurationError(key, raw, "true or false");
  }
}

export function readString(
  configService: ConfigService,
  key: string,
  fallback: string,
): string {
  const raw = readRaw(configService, key);
  return raw === undefined ? fallback : String(raw);
}
