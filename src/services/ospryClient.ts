import axios, { type AxiosInstance, type Method } from 'axios';
import type { Readable } from 'node:stream';
import type { Metadata, RenderOpts } from '../types/image.js';
import { DownloadError, MetadataDecodeError } from '../utils/errors.js';
import { encodeQuery } from '../utils/query.js';
import { DEFAULT_API_HOST, formatUrl } from '../utils/renderUrl.js';
import { parseEnvelope } from './metadata.js';

export const DEFAULT_SERVER_URL = 'https://api.ospry.io/v1';

export interface OspryClientConfig {
  /** Secret key for server-side calls, or a public key for uploads only. */
  key: string;
  serverUrl?: string;
  /** Host signed urls are issued for. */
  apiHost?: string;
  http?: AxiosInstance;
}

export type ImageData = Buffer | Uint8Array | Readable;

/**
 * The operations the demo server needs, so it can run against a fake.
 */
export interface ImageHostingClient {
  uploadPrivate(filename: string, data: ImageData): Promise<Metadata>;
  claim(id: string): Promise<Metadata>;
  makePrivate(id: string): Promise<Metadata>;
  makePublic(id: string): Promise<Metadata>;
  delete(id: string): Promise<void>;
  formatUrl(url: string, opts?: RenderOpts): string;
}

interface CallOptions {
  contentType: string;
  data?: unknown;
}

/**
 * Authenticated client for the image api. Every call is a single request
 * with the key as the basic-auth username.
 */
export class OspryClient implements ImageHostingClient {
  readonly key: string;
  readonly serverUrl: string;
  readonly apiHost: string;
  private readonly http: AxiosInstance;

  constructor(config: OspryClientConfig) {
    this.key = config.key;
    this.serverUrl = (config.serverUrl ?? DEFAULT_SERVER_URL).replace(/\/+$/, '');
    this.apiHost = config.apiHost ?? DEFAULT_API_HOST;
    this.http = config.http ?? axios.create();
  }

  /**
   * Upload a public image. The image is claimed automatically when the
   * client holds the secret key.
   */
  uploadPublic(filename: string, data: ImageData): Promise<Metadata> {
    return this.uploadImage(filename, false, data);
  }

  uploadPrivate(filename: string, data: ImageData): Promise<Metadata> {
    return this.uploadImage(filename, true, data);
  }

  async getMetadata(id: string): Promise<Metadata> {
    return this.expectMetadata(await this.call('GET', this.imagePath(id), { contentType: 'application/json' }));
  }

  /**
   * Claim an image uploaded client-side with the public key. Unclaimed
   * images expire when claiming is enabled for the account.
   */
  claim(id: string): Promise<Metadata> {
    return this.update(id, { isClaimed: true });
  }

  /** Private images are only served through signed urls. */
  makePrivate(id: string): Promise<Metadata> {
    return this.setPrivacy(id, true);
  }

  makePublic(id: string): Promise<Metadata> {
    return this.setPrivacy(id, false);
  }

  setPrivacy(id: string, isPrivate: boolean): Promise<Metadata> {
    return this.update(id, { isPrivate });
  }

  /** Later fetches of a deleted image fail with a 404. */
  async delete(id: string): Promise<void> {
    await this.call('DELETE', this.imagePath(id), { contentType: 'application/json' });
  }

  formatUrl(url: string, opts?: RenderOpts): string {
    return formatUrl(url, opts, this.key, this.apiHost);
  }

  /**
   * Fetch image data, rendered with `opts` when given. The caller owns the
   * returned stream.
   */
  async download(url: string, opts?: RenderOpts): Promise<Readable> {
    const res = await this.http.get<Readable>(this.formatUrl(url, opts), {
      responseType: 'stream',
      validateStatus: () => true,
    });
    if (res.status !== 200) {
      res.data.destroy();
      throw new DownloadError(res.status);
    }
    return res.data;
  }

  private async uploadImage(filename: string, isPrivate: boolean, data: ImageData): Promise<Metadata> {
    const query = encodeQuery({ filename, isPrivate: String(isPrivate) });
    // Any image content type works; it only has to differ from multipart/form-data
    const metadata = await this.call('POST', `/images?${query}`, { contentType: 'image/jpeg', data });
    return this.expectMetadata(metadata);
  }

  private async update(id: string, fields: { isClaimed?: boolean; isPrivate?: boolean }): Promise<Metadata> {
    const metadata = await this.call('PUT', this.imagePath(id), {
      contentType: 'application/json',
      data: fields,
    });
    return this.expectMetadata(metadata);
  }

  private imagePath(id: string): string {
    return `/images/${encodeURIComponent(id)}`;
  }

  private async call(method: Method, path: string, options: CallOptions): Promise<Metadata | null> {
    const res = await this.http.request<unknown>({
      method,
      url: `${this.serverUrl}${path}`,
      auth: { username: this.key, password: '' },
      headers: { 'Content-Type': options.contentType },
      data: options.data,
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
      validateStatus: () => true,
    });
    return parseEnvelope(res.data, res.status, res.statusText);
  }

  private expectMetadata(metadata: Metadata | null): Metadata {
    if (!metadata) {
      throw new MetadataDecodeError('response carried no metadata');
    }
    return metadata;
  }
}
