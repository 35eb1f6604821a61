/**
 * Server Module
 *
 * Provides:
 * - Loopback static file server on a chosen or OS-assigned port
 * - Content types for CSV, JSON/GeoJSON and Markdown data files
 * - Permissive CORS headers on every response
 * - Liveness probing and idempotent shutdown
 */

export {
  ContentServer,
  createContentServer,
  withContentServer,
  probeServer,
  contentTypeFor,
  CONTENT_TYPES,
  CORS_HEADERS,
  LOOPBACK_HOSTS,
  type ContentServerConfig,
  type ServerHandle,
} from './content-server.js';
