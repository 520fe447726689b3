import crypto from "crypto";
import { CanonicalSnapshot } from "./dto";

/**
 * JSON with object keys sorted at every level, so equal content always
 * serializes to the same string
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, v]) => `${JSON.stringify(key)}:${canonicalJson(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Content hash of a snapshot's mutable fields. Observation time and the
 * reporting source are left out: the same listing content seen again, or
 * seen through another source, hashes the same.
 */
export function fingerprintSnapshot(snapshot: CanonicalSnapshot): string {
  const { observedAt: _observedAt, sourceId: _sourceId, ...content } = snapshot;
  return crypto.createHash("sha256").update(canonicalJson(content)).digest("hex");
}
