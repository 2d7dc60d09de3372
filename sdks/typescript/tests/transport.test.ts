import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it, vi } from "vitest";
import { GieClient } from "../src/client";
import { Endpoint } from "../src/endpoints";
import { ConfigurationError } from "../src/errors";
import { AxiosSession } from "../src/transport/axios";
import { FetchSession } from "../src/transport/fetch";
import { jsonTransport, type RecordedRequest } from "./fakes";

type FetchInput = Parameters<typeof fetch>[0];
type FetchInit = Parameters<typeof fetch>[1];

describe("FetchSession", () => {
  it("sends a GET with its headers and encoded parameters", async () => {
    const requests: RecordedRequest[] = [];
    const session = new FetchSession({ headers: { "x-key": "test-key" }, transport: jsonTransport([1, 2], requests) });

    const result = await session.get(new URL("https://agsi.gie.eu/api/about"), { show: "listing", page: 2 });

    expect(result).toEqual([1, 2]);
    expect(requests[0].method).toBe("GET");
    expect(requests[0].url).toBe("https://agsi.gie.eu/api/about?show=listing&page=2");
    expect(requests[0].headers.get("x-key")).toBe("test-key");
  });

  it("looks headers up without regard to case", () => {
    const session = new FetchSession({ headers: { "X-Key": "test-key" }, transport: jsonTransport({}) });

    expect(session.header("x-key")).toBe("test-key");
    expect(session.header("X-KEY")).toBe("test-key");
    expect(session.header("authorization")).toBeUndefined();
  });

  it("aborts a request that outlives its timeout", async () => {
    vi.useFakeTimers();
    const transport = vi.fn(
      (_input: FetchInput, init?: FetchInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const session = new FetchSession({ headers: {}, transport, timeoutMs: 50 });

    const assertion = expect(session.get(new URL("https://agsi.gie.eu/api/"), {})).rejects.toThrow("aborted");
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    vi.useRealTimers();
  });
});

describe("AxiosSession", () => {
  function respondWith(data: unknown, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
    return async (config) => {
      seen.push(config);
      return { data, status: 200, statusText: "OK", headers: {}, config };
    };
  }

  it("reads x-key from the instance defaults", () => {
    const http = axios.create({ headers: { "x-key": "test-key" }, adapter: respondWith({}) });

    expect(new AxiosSession(http).header("x-key")).toBe("test-key");
  });

  it("reads x-key whatever its letter case", () => {
    const http = axios.create({ headers: { "X-Key": "test-key" }, adapter: respondWith({}) });
    http.defaults.headers.common["X-API-Trace"] = "on";

    const session = new AxiosSession(http);
    expect(session.header("x-key")).toBe("test-key");
    expect(session.header("x-api-trace")).toBe("on");
    expect(() => new GieClient({ apiKey: "test-key", session })).not.toThrow();
  });

  it("reads x-key from the common defaults", () => {
    const http = axios.create({ adapter: respondWith({}) });
    http.defaults.headers.common["x-key"] = "test-key";

    expect(new AxiosSession(http).header("x-key")).toBe("test-key");
  });

  it("serves a client whose key it carries", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const http = axios.create({ headers: { "x-key": "test-key" }, adapter: respondWith({ data: [] }, seen) });
    const client = new GieClient({ apiKey: "test-key", session: new AxiosSession(http) });

    const result = await client.queryUnavailability(Endpoint.ALSI, { type: "Planned", reverse: 1 });

    expect(result).toEqual({ data: [] });
    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe("get");
    expect(seen[0].url).toBe("https://alsi.gie.eu/api/unavailability");
    expect(seen[0].params).toEqual({ page: "1", reverse: "1", size: "30", type: "Planned" });
  });

  it("refuses to back a client when the key is missing", () => {
    const http = axios.create({ adapter: respondWith({}) });

    expect(() => new GieClient({ apiKey: "test-key", session: new AxiosSession(http) })).toThrow(ConfigurationError);
  });

  it("throws on a body that is not JSON", async () => {
    const http = axios.create({ headers: { "x-key": "test-key" }, adapter: respondWith("<html>oops</html>") });
    const session = new AxiosSession(http);

    await expect(session.get(new URL("https://agsi.gie.eu/api/"), {})).rejects.toMatchObject({
      code: "ERR_BAD_RESPONSE",
    });
  });

  it("lets adapter failures through unchanged", async () => {
    const failure = new Error("socket hang up");
    const http = axios.create({
      headers: { "x-key": "test-key" },
      adapter: async () => {
        throw failure;
      },
    });

    await expect(new AxiosSession(http).get(new URL("https://agsi.gie.eu/api/"), {})).rejects.toBe(failure);
  });
});
