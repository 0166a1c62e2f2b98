export interface IdempotencyEntry {
  key: string;
  firstSeenAt: Date;
  lastSeenAt: Date;
  count: number;
}

/** The parts of a push delivery that identify it; a redelivery repeats all three. */
export interface DeliveryIdentity {
  deliveryId: string;
  ref: string;
  afterSha: string;
}
