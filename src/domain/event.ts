/**
 * Core domain types for the ledger's event model.
 *
 * These types define the canonical shape of a recorded event as it
 * flows from an ingest handler into the ledger. They carry no
 * framework dependencies.
 */

/** Opaque identifier of the user (or other actor) behind an event. */
export type SubjectId = string | number;

/** Fields shared by every recorded event. */
interface BaseRecord {
  readonly subject_id: SubjectId;
  readonly ip_address: string; // 'unknown' when no address could be resolved
  readonly quantity: number;
  readonly timestamp: string; // ISO-8601, assigned once at construction
}

/** A page visit. Always counts as a single unit. */
export interface VisitRecord extends BaseRecord {
  readonly kind: 'visit';
  readonly page_url: string;
}

/** A product purchase; `quantity` is the number of units bought. */
export interface BuyRecord extends BaseRecord {
  readonly kind: 'buy';
  readonly promotion_id: number;
  readonly product_id: number;
}

export type EventRecord = VisitRecord | BuyRecord;

export type EventKind = EventRecord['kind'];
