import type { AxiosInstance } from "axios";
import { toSearchParams } from "../request";
import type { FilteredParameters, GieSession, Json } from "../types";

function findHeader(headers: Record<string, unknown>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && typeof value === "string") {
      return value;
    }
  }
  return undefined;
}

/**
 * Session over a caller-owned axios instance. The `x-key` header has to be
 * among the instance defaults, either top level or under `common`, in any
 * letter case.
 *
 * Axios rejects non-2xx responses itself; those errors reach the caller as
 * they are.
 */
export class AxiosSession implements GieSession {
  constructor(private readonly http: AxiosInstance) {}

  header(name: string): string | undefined {
    const defaults = this.http.defaults.headers;
    return findHeader(defaults, name) ?? findHeader(defaults.common, name);
  }

  async get<T = Json>(url: URL, params: FilteredParameters): Promise<T> {
    const response = await this.http.get<T>(url.toString(), {
      params: toSearchParams(params),
      responseType: "json",
      transitional: { silentJSONParsing: false },
    });
    return response.data;
  }
}
