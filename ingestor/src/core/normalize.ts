import { z } from "zod";
import {
  Address,
  CanonicalSnapshot,
  GeoPoint,
  ListingStatus,
  PropertyType,
} from "./dto";
import { NormalizationError } from "./errors";
import { parseMoney } from "./money";
import { isValidDate } from "./utils";

export type Normalizer = (raw: Record<string, unknown>) => CanonicalSnapshot;

// Field-level schemas: a value that does not fit is treated as absent
const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .refine((value) => value.length > 0);

const count = z
  .union([z.number(), z.string().regex(/^\s*\d+\s*$/)])
  .transform(Number)
  .refine((value) => Number.isInteger(value) && value >= 0);

const coordinate = z
  .union([z.number(), z.string()])
  .transform(Number)
  .refine((value) => Number.isFinite(value));

// a wall-clock datetime with no zone or offset is read as UTC, never in
// the host's zone
const ZONELESS_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

const instant = z
  .string()
  .transform((value) => value.trim())
  .transform((value) =>
    ZONELESS_DATETIME.test(value) ? `${value.replace(" ", "T")}Z` : value
  )
  .refine(isValidDate)
  .transform((value) => new Date(value).toISOString());

const paragraphs = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join(" ") : value).trim())
  .refine((value) => value.length > 0);

function read<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> | null {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walk a key path through nested objects, yielding undefined on any gap
 */
function at(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

// labels such as "auction_cancelled" join words with underscores, so word
// edges are letter edges rather than \b
const statusRules: [RegExp, ListingStatus][] = [
  [/(?<![a-z])(un|not[\s_-]?)sold(?![a-z])/, "ACTIVE"],
  [/(?<![a-z])cancel/, "CANCELLED"],
  [/(?<![a-z])void/, "VOIDED"],
  [/(?<![a-z])sold(?![a-z])/, "SOLD"],
  [/withdrawn|off[\s_-]?market/, "WITHDRAWN"],
  [/under[\s_-]?(offer|contract)/, "UNDER_OFFER"],
  [/schedul|auction/, "SCHEDULED"],
  [/active|for[\s_-]?sale|^buy$|current|live/, "ACTIVE"],
];

export function mapStatus(value: unknown): ListingStatus {
  const label = read(text, value)?.toLowerCase();
  if (!label) return "UNKNOWN";
  return statusRules.find(([pattern]) => pattern.test(label))?.[1] ?? "UNKNOWN";
}

const propertyTypeRules: [RegExp, PropertyType][] = [
  [/town\s?house|terrace|villa/, "TOWNHOUSE"],
  [/house|home|duplex/, "HOUSE"],
  [/unit|apartment|flat|studio/, "UNIT"],
  [/land|acreage|block/, "LAND"],
];

export function mapPropertyType(value: unknown): PropertyType {
  const label = read(text, value)?.toLowerCase();
  if (!label) return "OTHER";
  return propertyTypeRules.find(([pattern]) => pattern.test(label))?.[1] ?? "OTHER";
}

const areaUnits: [RegExp, number][] = [
  [/m2|m²|sqm|square\s?met/, 1],
  [/ha\b|hectare/, 10_000],
  [/acre|\bac\b/, 4046.8564224],
];

/**
 * Parse a land or floor area into square metres
 */
export function parseArea(value: unknown, unit?: unknown): number | null {
  let amount: number | null = null;
  if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
    amount = value;
  } else if (typeof value === "string") {
    const match = /(\d[\d,]*(?:\.\d+)?)/.exec(value);
    amount = match ? Number(match[1].replace(/,/g, "")) : null;
  }
  if (amount === null) return null;

  const label = (
    read(text, unit) ?? (typeof value === "string" ? value : "")
  ).toLowerCase();
  const factor = areaUnits.find(([pattern]) => pattern.test(label))?.[1] ?? 1;
  return Math.round(amount * factor * 100) / 100;
}

function readLocation(value: unknown): GeoPoint | null {
  const lat = read(coordinate, at(value, "latitude"));
  const lng = read(coordinate, at(value, "longitude"));
  return lat === null || lng === null ? null : { lat, lng };
}

type AddressDraft = Omit<Address, "suburb" | "state" | "postcode"> & {
  suburb: string | null;
  state: string | null;
  postcode: string | null;
};

function requireAddress(sourceId: string, draft: AddressDraft): Address {
  const { suburb, state, postcode } = draft;
  if (suburb === null) throw new NormalizationError(sourceId, "address.suburb");
  if (state === null) throw new NormalizationError(sourceId, "address.state");
  if (postcode === null) throw new NormalizationError(sourceId, "address.postcode");
  return { ...draft, suburb, state, postcode };
}

const QUALIFIED_ID = /^[a-z][a-z0-9-]*:.+$/;

/**
 * Prefix a source-local id with its namespace. Ids that already carry a
 * namespace ("realestate:149785064") are kept, so a payload from one
 * source can address a listing first seen on another.
 */
export function qualifyListingId(namespace: string, rawId: string): string {
  return QUALIFIED_ID.test(rawId) ? rawId : `${namespace}:${rawId}`;
}

/**
 * An explicit auction status wins; otherwise a known auction date turns an
 * active/unknown listing into a scheduled one.
 */
function resolveStatus(
  auctionStatus: ListingStatus,
  listingStatus: ListingStatus,
  auctionDatetime: string | null
): ListingStatus {
  if (auctionStatus !== "UNKNOWN") return auctionStatus;
  if (
    auctionDatetime !== null &&
    (listingStatus === "ACTIVE" || listingStatus === "UNKNOWN")
  ) {
    return "SCHEDULED";
  }
  return listingStatus;
}

/**
 * realestate-style payload: nested address/display, generalFeatures,
 * propertySizes and a display price string
 */
export function normalizeRealestate(raw: Record<string, unknown>): CanonicalSnapshot {
  const sourceId = "realestate";

  const rawId = read(text, raw.id);
  if (rawId === null) throw new NormalizationError(sourceId, "id");

  const address = requireAddress(sourceId, {
    suburb: read(text, at(raw, "address", "suburb")),
    state: read(text, at(raw, "address", "state")),
    postcode: read(text, at(raw, "address", "postcode")),
    fullAddress: read(text, at(raw, "address", "display", "fullAddress")),
    shortAddress: read(text, at(raw, "address", "display", "shortAddress")),
    streetNumber: null,
    streetName: null,
    unitNumber: null,
    location: readLocation(at(raw, "address", "location")),
  });

  const auctionDatetime = read(instant, at(raw, "auction", "dateTime"));
  const status = resolveStatus(
    mapStatus(at(raw, "auction", "status")),
    mapStatus(at(raw, "status", "type") ?? raw.status),
    auctionDatetime
  );

  return {
    listingId: qualifyListingId(sourceId, rawId),
    sourceId,
    observedAt: read(instant, raw.scrapedAt),
    address,
    propertyType: mapPropertyType(raw.propertyType),
    bedrooms: read(count, at(raw, "generalFeatures", "bedrooms", "value")),
    bathrooms: read(count, at(raw, "generalFeatures", "bathrooms", "value")),
    landSize: parseArea(
      at(raw, "propertySizes", "land", "displayValue"),
      at(raw, "propertySizes", "land", "sizeUnit")
    ),
    buildingSize: parseArea(
      at(raw, "propertySizes", "building", "displayValue"),
      at(raw, "propertySizes", "building", "sizeUnit")
    ),
    propertyLink: read(text, raw.propertyLink),
    description: read(paragraphs, raw.description),
    price:
      parseMoney(at(raw, "price", "value")) ??
      parseMoney(at(raw, "price", "display")) ??
      parseMoney(raw.price),
    auction: {
      status,
      auctionDatetime,
      notes: read(text, at(raw, "auction", "notes")),
    },
  };
}

/**
 * domain-style payload: flat address fields, priceDetails and an
 * auctionSchedule block
 */
export function normalizeDomain(raw: Record<string, unknown>): CanonicalSnapshot {
  const sourceId = "domain";

  const rawId = read(text, raw.listingId) ?? read(text, raw.id);
  if (rawId === null) throw new NormalizationError(sourceId, "listingId");

  const unitNumber = read(text, raw.unitNumber);
  const streetNumber = read(text, raw.streetNumber);
  const streetName = read(text, raw.street);
  const street =
    streetNumber && streetName ? `${streetNumber} ${streetName}` : null;

  const address = requireAddress(sourceId, {
    suburb: read(text, raw.suburb),
    state: read(text, raw.state),
    postcode: read(text, raw.postcode),
    fullAddress: read(text, raw.displayAddress),
    shortAddress: street && unitNumber ? `${unitNumber}/${street}` : street,
    streetNumber,
    streetName,
    unitNumber,
    location: readLocation(raw.geoLocation),
  });

  const listingStatus = mapStatus(raw.status);
  const auctionDatetime = read(instant, at(raw, "auctionSchedule", "time"));
  const status = resolveStatus(
    mapStatus(at(raw, "auctionSchedule", "status")),
    listingStatus === "UNKNOWN" ? mapStatus(raw.saleMode) : listingStatus,
    auctionDatetime
  );

  return {
    listingId: qualifyListingId(sourceId, rawId),
    sourceId,
    observedAt: read(instant, raw.dateUpdated),
    address,
    propertyType: mapPropertyType(raw.propertyType),
    bedrooms: read(count, raw.beds),
    bathrooms: read(count, raw.baths),
    landSize: parseArea(raw.landArea, raw.landAreaUnit),
    buildingSize: parseArea(raw.buildingArea, raw.buildingAreaUnit),
    propertyLink: read(text, raw.listingUrl),
    description: read(paragraphs, raw.description),
    price:
      parseMoney(at(raw, "priceDetails", "price")) ??
      parseMoney(at(raw, "priceDetails", "displayPrice")),
    auction: {
      status,
      auctionDatetime,
      notes: read(text, at(raw, "auctionSchedule", "notes")),
    },
  };
}

/**
 * Normalizers by source id. Supporting a new source means registering a
 * normalizer here; nothing downstream changes.
 */
export class NormalizerRegistry {
  private normalizers = new Map<string, Normalizer>();

  register(sourceId: string, normalizer: Normalizer): this {
    this.normalizers.set(sourceId, normalizer);
    return this;
  }

  has(sourceId: string): boolean {
    return this.normalizers.has(sourceId);
  }

  sources(): string[] {
    return Array.from(this.normalizers.keys());
  }

  normalize(sourceId: string, raw: unknown): CanonicalSnapshot {
    const normalizer = this.normalizers.get(sourceId);
    if (!normalizer) {
      throw new NormalizationError(
        sourceId,
        "source",
        `No normalizer registered for source ${sourceId}`
      );
    }
    if (!isRecord(raw)) {
      throw new NormalizationError(
        sourceId,
        "payload",
        `${sourceId} payload is not an object`
      );
    }
    return normalizer(raw);
  }
}

export function createDefaultRegistry(): NormalizerRegistry {
  return new NormalizerRegistry()
    .register("realestate", normalizeRealestate)
    .register("domain", normalizeDomain);
}

const defaultRegistry = createDefaultRegistry();

export function normalize(sourceId: string, raw: unknown): CanonicalSnapshot {
  return defaultRegistry.normalize(sourceId, raw);
}
