export type TargetErrorKind =
  | "rate_limited"
  | "transient_network"
  | "permanent_rejection";

export type TargetOutcome =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly errorKind: TargetErrorKind;
      readonly error: string;
      readonly retryAfterSeconds?: number;
    };

/**
 * Posts one message to a destination. Implementations report failures in
 * the outcome instead of throwing.
 */
export type DeliveryTarget = (
  destinationId: string,
  text: string,
  imageUrl: string | null,
) => Promise<TargetOutcome>;
