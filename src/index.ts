export { OspryClient, DEFAULT_SERVER_URL } from './services/ospryClient.js';
export type { ImageData, ImageHostingClient, OspryClientConfig } from './services/ospryClient.js';
export { decodeMetadata, parseEnvelope } from './services/metadata.js';
export {
  DEFAULT_API_HOST,
  buildImageUrl,
  type BuildOptions,
  formatUrl,
  normalizeImageUrl,
  validateRenderOpts,
} from './utils/renderUrl.js';
export { sign, signPayload, signingPayload, verifySignedUrl } from './utils/signature.js';
export { encodeQuery, queryEscape } from './utils/query.js';
export { formatRfc3339Nano, parseRfc3339 } from './utils/time.js';
export {
  DownloadError,
  MetadataDecodeError,
  OspryClientError,
  OspryError,
  RenderOptsValidationError,
  UrlParseError,
} from './utils/errors.js';
export { IMAGE_FORMATS, isImageFormat } from './types/image.js';
export type { ApiErrorBody, ImageFormat, Metadata, NormalizedImageUrl, RenderOpts } from './types/image.js';
export { InMemoryMetadataStore } from './store/metadataStore.js';
export type { MetadataStore } from './store/metadataStore.js';
