export { GieClient } from "./client";
export { loadConfig } from "./config";
export type { GieConfig } from "./config";
export { ApiKey } from "./credentials";
export { DEFAULT_BASE_URLS, ENDPOINTS, Endpoint, isEndpoint } from "./endpoints";
export {
  ConfigurationError,
  GieClientError,
  ValidationError,
  isConfigurationError,
  isValidationError,
} from "./errors";
export type { GieErrorCode } from "./errors";
export { createLogger } from "./logger";
export type { LogLevel, LoggerOptions } from "./logger";
export { buildUrl, filterParams, formatQueryValue, toSearchParams } from "./request";
export { AxiosSession } from "./transport/axios";
export { FetchSession } from "./transport/fetch";
export type { FetchSessionOptions } from "./transport/fetch";
export { MAX_PAGE_SIZE, MIN_PAGE_SIZE, REVERSE_OPTIONS, validateDateRange, validateParams } from "./validation";
export type {
  ClientOptions,
  DateInput,
  EndFlag,
  FilteredParameters,
  GieSession,
  Json,
  JsonValue,
  ParamValue,
  QueryParameters,
  RequestKind,
  ReverseFlag,
  StorageQuery,
  StorageType,
  UnavailabilityQuery,
  UnavailabilityType,
} from "./types";
