import { isImageFormat, type NormalizedImageUrl, type RenderOpts } from '../types/image.js';
import { RenderOptsValidationError, UrlParseError } from './errors.js';
import { encodeQuery } from './query.js';
import { signPayload, signingPayload } from './signature.js';
import { formatRfc3339Nano, parseRfc3339 } from './time.js';

/** Host that serves signed urls. */
export const DEFAULT_API_HOST = 'api.ospry.io';

const INTEGER = /^[+-]?\d+$/;

function parseUrl(value: string): URL {
  try {
    return new URL(value);
  } catch {
    throw new UrlParseError(`invalid url ${JSON.stringify(value)}`, value);
  }
}

function parseDimension(name: string, value: string): number {
  const n = INTEGER.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(n)) {
    throw new UrlParseError(`invalid ${name} ${JSON.stringify(value)}`, value);
  }
  return n;
}

function parseTimeExpired(value: string): Date {
  const date = parseRfc3339(value);
  if (!date) {
    throw new UrlParseError(`invalid timeExpired ${JSON.stringify(value)}`, value);
  }
  return date;
}

/**
 * Throws a RenderOptsValidationError for negative or fractional dimensions,
 * an invalid expiry date, or a format the api does not render.
 */
export function validateRenderOpts(opts: RenderOpts): void {
  if (opts.format && !isImageFormat(opts.format)) {
    throw new RenderOptsValidationError(`invalid format ${opts.format}`, 'format');
  }
  for (const field of ['maxHeight', 'maxWidth'] as const) {
    const value = opts[field];
    if (value === undefined) continue;
    if (!Number.isSafeInteger(value)) {
      throw new RenderOptsValidationError(`${field} must be an integer below 2^53`, field);
    }
    if (value < 0) {
      throw new RenderOptsValidationError(`${field} can't be negative`, field);
    }
  }
  if (opts.timeExpired !== undefined && Number.isNaN(opts.timeExpired.getTime())) {
    throw new RenderOptsValidationError('timeExpired is not a valid date', 'timeExpired');
  }
}

// Zero dimensions and an empty format mean "no constraint" and are dropped
function compact(opts: RenderOpts): RenderOpts {
  const out: RenderOpts = {};
  if (opts.format) out.format = opts.format;
  if (opts.maxHeight) out.maxHeight = opts.maxHeight;
  if (opts.maxWidth) out.maxWidth = opts.maxWidth;
  if (opts.timeExpired) out.timeExpired = new Date(opts.timeExpired.getTime());
  return out;
}

/**
 * Resolve the effective rendering options and the underlying image url of
 * `rawUrl`, which may be a plain image url, a rendered url or a signed url.
 *
 * Options the caller sets win; unset ones are filled from the url's query.
 * A `url` query parameter names the underlying image of a signed url.
 */
export function normalizeImageUrl(rawUrl: string, callerOpts: RenderOpts = {}): NormalizedImageUrl {
  const parsed = parseUrl(rawUrl);
  const query = parsed.searchParams;
  const opts: RenderOpts = { ...callerOpts };

  const format = query.get('format');
  if (opts.format === undefined && format) {
    opts.format = format;
  }
  const maxWidth = query.get('maxWidth');
  if (opts.maxWidth === undefined && maxWidth) {
    opts.maxWidth = parseDimension('maxWidth', maxWidth);
  }
  const maxHeight = query.get('maxHeight');
  if (opts.maxHeight === undefined && maxHeight) {
    opts.maxHeight = parseDimension('maxHeight', maxHeight);
  }
  const timeExpired = query.get('timeExpired');
  let timeExpiredText: string | undefined;
  if (opts.timeExpired === undefined && timeExpired) {
    opts.timeExpired = parseTimeExpired(timeExpired);
    timeExpiredText = timeExpired;
  }

  let imageUrl: URL;
  const wrapped = query.get('url');
  if (wrapped) {
    imageUrl = parseUrl(wrapped);
  } else {
    imageUrl = new URL(parsed.href);
    imageUrl.search = '';
  }

  validateRenderOpts(opts);
  const normalized: NormalizedImageUrl = { opts: compact(opts), imageUrl };
  if (timeExpiredText !== undefined) normalized.timeExpiredText = timeExpiredText;
  return normalized;
}

export interface BuildOptions {
  apiHost?: string;
  /**
   * Transmitted form of `opts.timeExpired`. Used verbatim when it denotes
   * the same instant, so finer-than-millisecond expiries keep their
   * signature.
   */
  timeExpiredText?: string;
}

function expiryText(timeExpired: Date, text: string | undefined): string {
  if (text !== undefined && parseRfc3339(text)?.getTime() === timeExpired.getTime()) {
    return text;
  }
  return formatRfc3339Nano(timeExpired);
}

/**
 * Assemble the url for an image with the given options. With an expiry the
 * url is signed and served from the api host; otherwise the options are
 * appended to the image url, replacing its query.
 */
export function buildImageUrl(
  imageUrl: URL | string,
  opts: RenderOpts,
  secretKey: string,
  options: BuildOptions = {}
): string {
  validateRenderOpts(opts);
  const image = typeof imageUrl === 'string' ? parseUrl(imageUrl) : imageUrl;
  const params: Record<string, string | undefined> = {};
  let out: URL;

  if (opts.timeExpired) {
    const timeExpired = expiryText(opts.timeExpired, options.timeExpiredText);
    params.signature = signPayload(secretKey, signingPayload(image.href, timeExpired));
    params.timeExpired = timeExpired;
    params.url = image.href;
    out = new URL(`https://${options.apiHost ?? DEFAULT_API_HOST}/`);
  } else {
    out = new URL(image.href);
  }

  if (opts.format) params.format = opts.format;
  if (opts.maxHeight && opts.maxHeight > 0) params.maxHeight = String(opts.maxHeight);
  if (opts.maxWidth && opts.maxWidth > 0) params.maxWidth = String(opts.maxWidth);

  const query = encodeQuery(params);
  out.search = query ? `?${query}` : '';
  return out.href;
}

/**
 * Produce a url that renders the image at `rawUrl` with `opts`, signing it
 * with `secretKey` when an expiry is set.
 */
export function formatUrl(
  rawUrl: string,
  opts: RenderOpts | undefined,
  secretKey: string,
  apiHost: string = DEFAULT_API_HOST
): string {
  const normalized = normalizeImageUrl(rawUrl, opts);
  return buildImageUrl(normalized.imageUrl, normalized.opts, secretKey, {
    apiHost,
    timeExpiredText: normalized.timeExpiredText,
  });
}
