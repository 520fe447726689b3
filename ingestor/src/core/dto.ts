export type ISO = string;

/** Monetary amount as an integer number of cents. */
export type Money = number;

export const PROPERTY_TYPES = [
  "HOUSE",
  "UNIT",
  "TOWNHOUSE",
  "LAND",
  "OTHER",
] as const;
export type PropertyType = (typeof PROPERTY_TYPES)[number];

export const LISTING_STATUSES = [
  "SCHEDULED",
  "CANCELLED",
  "VOIDED",
  "SOLD",
  "WITHDRAWN",
  "ACTIVE",
  "UNDER_OFFER",
  "UNKNOWN",
] as const;
export type ListingStatus = (typeof LISTING_STATUSES)[number];

export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface Address {
  suburb: string;
  state: string; // e.g., "Vic"
  postcode: string;
  fullAddress: string | null;
  shortAddress: string | null;
  streetNumber: string | null;
  streetName: string | null;
  unitNumber: string | null;
  location: GeoPoint | null;
}

export interface PriceHistoryEntry {
  price: Money;
  timestamp: ISO;
  source: string | null;
}

export interface AuctionHistoryEntry {
  auctionDatetime: ISO | null;
  status: ListingStatus;
  notes: string | null;
  timestamp: ISO;
}

/** What one snapshot says about the auction / sale state. */
export interface AuctionObservation {
  status: ListingStatus;
  auctionDatetime: ISO | null;
  notes: string | null;
}

/**
 * One normalized observation of a listing, as produced by a source
 * normalizer. Everything except identity and address is optional.
 */
export interface CanonicalSnapshot {
  listingId: string; // "<namespace>:<id>"
  sourceId: string;
  observedAt: ISO | null; // scrape time reported by the payload, if any

  address: Address;
  propertyType: PropertyType;
  bedrooms: number | null;
  bathrooms: number | null;
  landSize: number | null; // m²
  buildingSize: number | null; // m²
  propertyLink: string | null;
  description: string | null;

  price: Money | null;
  auction: AuctionObservation;
}

export interface Listing {
  listingId: string;

  address: Address;
  suburb: string;
  propertyType: PropertyType;
  bedrooms: number | null;
  bathrooms: number | null;
  landSize: number | null;
  buildingSize: number | null;
  propertyLink: string | null;
  description: string | null;

  status: ListingStatus;
  currentPrice: Money | null;
  previousPrice: Money | null;
  auctionDatetime: ISO | null; // next scheduled auction

  // chronological (oldest first); append only
  priceHistory: PriceHistoryEntry[];
  auctionHistory: AuctionHistoryEntry[];

  createdAt: ISO;
  updatedAt: ISO;
  source: string | null; // last writing source
  version: number;
}
