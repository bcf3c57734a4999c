export type { EventRecord, EventKind, VisitRecord, BuyRecord, SubjectId } from './event.js';
export type { EventLedger, LedgerView } from './ledger.js';
export { InvalidQuantityError, InvalidRecordError, LedgerReadError, assertValidQuantity } from './errors.js';
