export const Endpoint = {
  AGSI: "AGSI",
  ALSI: "ALSI",
} as const;

export type Endpoint = (typeof Endpoint)[keyof typeof Endpoint];

export const ENDPOINTS: readonly Endpoint[] = Object.values(Endpoint);

export const DEFAULT_BASE_URLS: Readonly<Record<Endpoint, string>> = {
  AGSI: "https://agsi.gie.eu/api/",
  ALSI: "https://alsi.gie.eu/api/",
};

export function isEndpoint(value: unknown): value is Endpoint {
  return ENDPOINTS.some((endpoint) => endpoint === value);
}

export function resolveBaseUrls(
  overrides: Partial<Record<Endpoint, string>> = {},
): Readonly<Record<Endpoint, string>> {
  return {
    AGSI: overrides.AGSI ?? DEFAULT_BASE_URLS.AGSI,
    ALSI: overrides.ALSI ?? DEFAULT_BASE_URLS.ALSI,
  };
}
