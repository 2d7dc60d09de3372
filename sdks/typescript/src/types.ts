import type { Logger } from "pino";
import type { Endpoint } from "./endpoints";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type Json = { [key: string]: JsonValue } | JsonValue[];

export type ParamValue = string | number | boolean | Date | null | undefined;
export type QueryParameters = Record<string, ParamValue>;

/** Parameters left after falsy values are dropped. */
export type FilteredParameters = Record<string, string | number | boolean | Date>;

export type RequestKind = "storage" | "unavailability";

export type StorageType = "EU" | "NE" | "AI";
export type UnavailabilityType = "Planned" | "Unplanned";
export type EndFlag = "Confirmed" | "Estimate";
export type ReverseFlag = boolean | "true" | "false" | 0 | 1;

export type DateInput = Date | string;

interface CommonQuery {
  page?: number | string;
  reverse?: ReverseFlag;
  size?: number | string;
  fromDate?: DateInput;
  toDate?: DateInput;
  country?: string;
  company?: string;
  facility?: string;
}

export interface StorageQuery extends CommonQuery {
  date?: DateInput;
  updated?: DateInput;
  type?: StorageType;
}

export interface UnavailabilityQuery extends CommonQuery {
  start?: DateInput;
  end?: DateInput;
  endFlag?: EndFlag;
  type?: UnavailabilityType;
}

/**
 * HTTP capability the client dispatches through. Implementations own headers,
 * timeouts and the wire encoding of parameters.
 */
export interface GieSession {
  header(name: string): string | undefined;
  get<T = Json>(url: URL, params: FilteredParameters): Promise<T>;
}

interface BaseClientOptions {
  apiKey: string;
  baseUrls?: Partial<Record<Endpoint, string>>;
  logger?: Logger;
}

interface SessionClientOptions extends BaseClientOptions {
  session: GieSession;
  transport?: never;
  timeoutMs?: never;
}

interface TransportClientOptions extends BaseClientOptions {
  session?: undefined;
  transport?: typeof fetch;
  timeoutMs?: number;
}

export type ClientOptions = SessionClientOptions | TransportClientOptions;
