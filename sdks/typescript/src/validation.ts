import { z } from "zod";
import { ENDPOINTS, isEndpoint } from "./endpoints";
import { ValidationError } from "./errors";
import { isPresent } from "./request";
import type { ParamValue, QueryParameters, RequestKind } from "./types";

export const MIN_PAGE_SIZE = 1;
export const MAX_PAGE_SIZE = 300;

export const REVERSE_OPTIONS = ["true", "false", 0, 1] as const;

const integerInput = z.union([z.number(), z.string().regex(/^-?\d+$/).transform(Number)]);
const pageSchema = integerInput.pipe(z.number().int().positive());
const sizeSchema = integerInput.pipe(z.number().int().min(MIN_PAGE_SIZE).max(MAX_PAGE_SIZE));

// Booleans stand in for 1 and 0.
const reverseSchema = z.union([z.boolean(), z.enum(["true", "false"]), z.literal(0), z.literal(1)]);

export const typeSchemas = {
  storage: z.enum(["EU", "NE", "AI"]),
  unavailability: z.enum(["Planned", "Unplanned"]),
};

export const DATE_FIELDS = ["from", "to", "start", "end", "date", "updated"] as const;

export const endFlagSchema = z.enum(["Confirmed", "Estimate"]);

type Rule = (endpoint: string, params: QueryParameters, kind: RequestKind) => ValidationError | undefined;

function isGiven(value: ParamValue): boolean {
  return value !== undefined && value !== null;
}

function oneOf(field: string, allowed: readonly unknown[]): ValidationError {
  return new ValidationError({
    field,
    message: `\`${field}\` must be one of: ${allowed.map(String).join(", ")}`,
    allowed,
  });
}

function toTimestamp(value: string | number | true | Date): number {
  if (value instanceof Date) {
    return value.getTime();
  }
  return typeof value === "string" ? Date.parse(value) : Number.NaN;
}

function checkDate(value: ParamValue, field: string): ValidationError | undefined {
  return isPresent(value) && Number.isNaN(toTimestamp(value))
    ? new ValidationError({ field, message: `\`${field}\` must be a valid date` })
    : undefined;
}

function checkDateRange(
  start: ParamValue,
  end: ParamValue,
  fields: readonly [string, string],
): ValidationError | undefined {
  if (!isPresent(start) || !isPresent(end)) {
    return undefined;
  }
  const [startField, endField] = fields;
  const invalid = checkDate(start, startField) ?? checkDate(end, endField);
  if (invalid) {
    return invalid;
  }
  if (toTimestamp(start) > toTimestamp(end)) {
    return new ValidationError({
      field: startField,
      message: `\`${startField}\` date is after \`${endField}\` date`,
    });
  }
  return undefined;
}

/**
 * Checks that `start` is not after `end`. Either side missing passes.
 */
export function validateDateRange(
  start: ParamValue,
  end: ParamValue,
  fields: readonly [string, string] = ["from", "to"],
): void {
  const failure = checkDateRange(start, end, fields);
  if (failure) {
    throw failure;
  }
}

const rules: readonly Rule[] = [
  (endpoint) => (isEndpoint(endpoint) ? undefined : oneOf("endpoint", ENDPOINTS)),
  (_endpoint, params) =>
    !isPresent(params.country) && (isPresent(params.company) || isPresent(params.facility))
      ? new ValidationError({
          field: "country",
          message: "`country` must be provided if `company` or `facility` are passed",
        })
      : undefined,
  (_endpoint, params) =>
    isPresent(params.facility) && !isPresent(params.company)
      ? new ValidationError({ field: "company", message: "`company` must be provided if `facility` is passed" })
      : undefined,
  (_endpoint, params) => {
    for (const field of DATE_FIELDS) {
      const invalid = checkDate(params[field], field);
      if (invalid) {
        return invalid;
      }
    }
    return (
      checkDateRange(params.from, params.to, ["from", "to"]) ??
      checkDateRange(params.start, params.end, ["start", "end"])
    );
  },
  (_endpoint, params) =>
    isGiven(params.page) && !pageSchema.safeParse(params.page).success
      ? new ValidationError({ field: "page", message: "`page` param must be a positive integer" })
      : undefined,
  (_endpoint, params) =>
    isGiven(params.size) && !sizeSchema.safeParse(params.size).success
      ? new ValidationError({
          field: "size",
          message: `\`size\` param must be between ${MIN_PAGE_SIZE} and ${MAX_PAGE_SIZE}`,
        })
      : undefined,
  (_endpoint, params) =>
    isPresent(params.reverse) && !reverseSchema.safeParse(params.reverse).success
      ? oneOf("reverse", REVERSE_OPTIONS)
      : undefined,
  (_endpoint, params, kind) => {
    const schema = typeSchemas[kind];
    return isPresent(params.type) && !schema.safeParse(params.type).success
      ? oneOf("type", schema.options)
      : undefined;
  },
  (_endpoint, params, kind) =>
    kind === "unavailability" && isPresent(params.end_flag) && !endFlagSchema.safeParse(params.end_flag).success
      ? oneOf("end_flag", endFlagSchema.options)
      : undefined,
];

/**
 * Validates outgoing query parameters (`from`, `to`, `end_flag`, ...) for a
 * request kind. Rules run in a fixed order and the first failure is thrown,
 * so a later violation is only reported once earlier ones are fixed.
 */
export function validateParams(endpoint: string, params: QueryParameters, kind: RequestKind): void {
  for (const rule of rules) {
    const failure = rule(endpoint, params, kind);
    if (failure) {
      throw failure;
    }
  }
}
