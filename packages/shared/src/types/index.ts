/**
 * Shared types for framed routing
 */

export { Method, normalizeMethod, type HeaderEntries, type RequestHeadInit } from './http'
export { ready, type Readiness, type Service, type ServiceFactory } from './service'
