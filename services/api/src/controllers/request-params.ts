import type { Request } from 'express';

/**
 * Optional company filter from the query string or, for multipart and JSON
 * bodies, the request body
 */
export function requestedCompanyId(req: Request): string | null {
  const fromQuery = req.query.companyId;
  if (typeof fromQuery === 'string' && fromQuery.trim()) {
    return fromQuery.trim();
  }
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && 'companyId' in body) {
    const fromBody = body.companyId;
    if (typeof fromBody === 'string' && fromBody.trim()) {
      return fromBody.trim();
    }
  }
  return null;
}
