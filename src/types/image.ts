export const IMAGE_FORMATS = ['jpeg', 'png', 'gif'] as const;

export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export interface Metadata {
  id: string;
  url: string;
  httpsUrl: string;
  timeCreated: Date;
  isClaimed: boolean;
  isPrivate: boolean;
  filename: string;
  format: ImageFormat;
  size: number;
  height: number;
  width: number;
}

/**
 * Rendering options for an image url. A field left undefined is unset and
 * may be filled from the url's own query string.
 */
export interface RenderOpts {
  format?: string;
  maxHeight?: number;
  maxWidth?: number;
  /** Expiry of a signed url. Setting it makes the url signed. */
  timeExpired?: Date;
}

export interface ApiErrorBody {
  httpStatusCode: number;
  cause: string;
  message: string;
}

export interface NormalizedImageUrl {
  opts: RenderOpts;
  imageUrl: URL;
  /** Expiry exactly as transmitted, when it was taken from the url's query. */
  timeExpiredText?: string;
}

export function isImageFormat(value: string): value is ImageFormat {
  return (IMAGE_FORMATS as readonly string[]).includes(value);
}
