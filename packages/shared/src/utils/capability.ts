/**
 * An optional dependency, decided once at start-up: either a ready client or
 * the reason it is missing.
 */
export type Capability<T> =
  | { readonly status: 'configured'; readonly client: T }
  | { readonly status: 'unavailable'; readonly reason: string };

export function configured<T>(client: T): Capability<T> {
  return { status: 'configured', client };
}

export function unavailable<T>(reason: string): Capability<T> {
  return { status: 'unavailable', reason };
}
