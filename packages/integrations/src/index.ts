/**
 * @trid-check/integrations: everything that crosses the network.
 *
 * Provides the ingestion gateway that validates and downloads disclosure PDFs
 * for the compliance engine.
 */

export {
  DocumentGateway,
  hasPdfMagic,
  PDF_MAGIC,
  fetchBoth,
  createGatewayConfig,
  loadGatewayConfig,
  parseDomainList,
  DEFAULT_ALLOWED_DOMAINS,
  DEFAULT_MAX_PDF_BYTES,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_MAX_REDIRECTS,
  MAX_TIMEOUT_SECONDS,
} from './documents/index.js'
export type { GatewayConfig, GatewayConfigInput } from './documents/index.js'
