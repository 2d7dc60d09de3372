import type { Logger } from "pino";
import { loadConfig } from "./config";
import { ApiKey } from "./credentials";
import { Endpoint, ENDPOINTS, isEndpoint, resolveBaseUrls } from "./endpoints";
import { ConfigurationError, ValidationError } from "./errors";
import { createLogger } from "./logger";
import { buildUrl, filterParams } from "./request";
import { FetchSession } from "./transport/fetch";
import type {
  ClientOptions,
  GieSession,
  Json,
  QueryParameters,
  RequestKind,
  StorageQuery,
  UnavailabilityQuery,
} from "./types";
import { validateParams } from "./validation";

const API_KEY_HEADER = "x-key";
const DEFAULT_PAGE = 1;
const DEFAULT_SIZE = 30;

/**
 * Client for the GIE transparency platforms (AGSI storage, ALSI LNG).
 *
 * The session and the credential are fixed at construction. A session passed
 * in must already carry the same `x-key`; a mismatch fails here rather than
 * on the first request.
 */
export class GieClient {
  private readonly apiKey: ApiKey;
  private readonly session: GieSession;
  private readonly baseUrls: Readonly<Record<Endpoint, string>>;
  private readonly logger: Logger;

  constructor(options: ClientOptions) {
    this.apiKey = ApiKey.from(options.apiKey);
    this.baseUrls = resolveBaseUrls(options.baseUrls);
    this.logger = options.logger ?? createLogger();

    if (options.session) {
      this.session = options.session;
      this.assertSessionKey();
    } else {
      this.session = new FetchSession({
        headers: { [API_KEY_HEADER]: this.apiKey.value },
        transport: options.transport,
        timeoutMs: options.timeoutMs,
      });
    }
  }

  /** Builds a client from `GIE_*` environment variables. */
  static fromEnv(
    source: NodeJS.ProcessEnv = process.env,
    options: { transport?: typeof fetch; logger?: Logger } = {},
  ): GieClient {
    const config = loadConfig(source);
    return new GieClient({
      apiKey: config.apiKey,
      baseUrls: config.baseUrls,
      timeoutMs: config.timeoutMs,
      transport: options.transport,
      logger: options.logger ?? createLogger({ level: config.logLevel }),
    });
  }

  get supportedEndpoints(): readonly Endpoint[] {
    return ENDPOINTS;
  }

  async fetch<T = Json>(endpoint: Endpoint, params?: QueryParameters, path?: string): Promise<T> {
    const url = buildUrl(this.baseUrlFor(endpoint), path);
    const query = filterParams(params);
    this.logger.debug({ endpoint, url: url.toString(), params: Object.keys(query) }, "Dispatching GIE request");
    return this.session.get<T>(url, query);
  }

  async queryStorage<T = Json>(endpoint: Endpoint, query: StorageQuery = {}): Promise<T> {
    const params: QueryParameters = {
      from: query.fromDate,
      to: query.toDate,
      date: query.date,
      updated: query.updated,
      page: query.page ?? DEFAULT_PAGE,
      reverse: query.reverse,
      size: query.size ?? DEFAULT_SIZE,
      type: query.type,
      country: query.country,
      company: query.company,
      facility: query.facility,
    };
    this.validate(endpoint, params, "storage");
    return this.fetch<T>(endpoint, params);
  }

  async queryUnavailability<T = Json>(endpoint: Endpoint, query: UnavailabilityQuery = {}): Promise<T> {
    const params: QueryParameters = {
      from: query.fromDate,
      to: query.toDate,
      start: query.start,
      end: query.end,
      end_flag: query.endFlag,
      page: query.page ?? DEFAULT_PAGE,
      reverse: query.reverse,
      size: query.size ?? DEFAULT_SIZE,
      type: query.type,
      country: query.country,
      company: query.company,
      facility: query.facility,
    };
    this.validate(endpoint, params, "unavailability");
    return this.fetch<T>(endpoint, params, "unavailability");
  }

  /** Lists the EIC identifiers known to the platform. */
  async queryIdentifierListing<T = Json>(endpoint: Endpoint, showListing = false): Promise<T> {
    return this.fetch<T>(endpoint, showListing ? { show: "listing" } : undefined, "about");
  }

  async queryNewsListing<T = Json>(endpoint: Endpoint, newsUrl?: string): Promise<T> {
    return this.fetch<T>(endpoint, newsUrl ? { url: newsUrl } : undefined, "news");
  }

  private baseUrlFor(endpoint: Endpoint): string {
    if (!isEndpoint(endpoint)) {
      throw new ValidationError({
        field: "endpoint",
        message: `\`endpoint\` must be one of: ${ENDPOINTS.join(", ")}`,
        allowed: ENDPOINTS,
      });
    }
    return this.baseUrls[endpoint];
  }

  private validate(endpoint: Endpoint, params: QueryParameters, kind: RequestKind): void {
    try {
      validateParams(endpoint, params, kind);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.debug({ endpoint, kind, field: error.field }, "Rejected GIE query parameters");
      }
      throw error;
    }
  }

  private assertSessionKey(): void {
    const header = this.session.header(API_KEY_HEADER);
    if (header === undefined) {
      throw new ConfigurationError(`Session headers must include '${API_KEY_HEADER}'`);
    }
    if (!this.apiKey.matches(header)) {
      throw new ConfigurationError(`Session headers include incorrect '${API_KEY_HEADER}'`);
    }
  }
}
