/**
 * Demand ordering strategies applied before a batch is dispatched.
 *
 * All orderings are stable: equal keys keep their input order.
 */
export type OrderingName = 'BANDWIDTH' | 'SMART';

export const ordering = {
  /** Descending bandwidth. Default. */
  BANDWIDTH: {
    name: 'BANDWIDTH',
  },

  /**
   * Descending bandwidth, then descending shortest-path distance: among equal
   * rates the hardest-to-route demands go first. Unreachable pairs sort as
   * infinitely long.
   */
  SMART: {
    name: 'SMART',
  },
} as const satisfies Record<OrderingName, { readonly name: OrderingName }>;
