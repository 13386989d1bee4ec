export interface PageLimits {
  defaultLimit: number;
  maxLimit: number;
}

export interface Page {
  skip: number;
  take: number;
}

/**
 * Turns optional `skip`/`limit` query values into TypeORM `skip`/`take`,
 * applying the configured default and cap.
 */
export function resolvePage(
  query: { skip?: number; limit?: number },
  limits: PageLimits,
): Page {
  const skip = Math.max(0, query.skip ?? 0);
  const limit = query.limit ?? limits.defaultLimit;
  return { skip, take: Math.min(Math.max(1, limit), limits.maxLimit) };
}
