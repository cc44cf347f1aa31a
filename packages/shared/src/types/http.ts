/**
 * HTTP vocabulary shared across packages
 */

export enum Method {
  GET = 'GET',
  POST = 'POST',
  PUT = 'PUT',
  DELETE = 'DELETE',
  PATCH = 'PATCH',
  HEAD = 'HEAD',
  OPTIONS = 'OPTIONS',
  CONNECT = 'CONNECT',
  TRACE = 'TRACE',
}

export type HeaderEntries = Record<string, string> | Array<[string, string]>

/**
 * Pre-parsed request line and headers
 */
export interface RequestHeadInit {
  method: string
  uri: string
  version?: string
  headers?: HeaderEntries
}

/**
 * Canonical form of a verb token for membership checks
 */
export function normalizeMethod(method: string): string {
  return method.trim().toUpperCase()
}
