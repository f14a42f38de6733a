import { isImageFormat, type ApiErrorBody, type Metadata } from '../types/image.js';
import { MetadataDecodeError, OspryError } from '../utils/errors.js';
import { parseRfc3339 } from '../utils/time.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field<T>(
  obj: JsonObject,
  key: string,
  check: (v: unknown) => v is T,
  expected: string
): T {
  const value = obj[key];
  if (!check(value)) {
    throw new MetadataDecodeError(`metadata field ${key} should be ${expected}`);
  }
  return value;
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

export function decodeMetadata(raw: unknown): Metadata {
  if (!isObject(raw)) {
    throw new MetadataDecodeError('metadata should be an object');
  }

  const timeCreated = parseRfc3339(field(raw, 'timeCreated', isString, 'a timestamp'));
  if (!timeCreated) {
    throw new MetadataDecodeError('metadata field timeCreated should be a timestamp');
  }
  const format = field(raw, 'format', isString, 'a string');
  if (!isImageFormat(format)) {
    throw new MetadataDecodeError(`metadata field format has unknown value ${format}`);
  }

  return {
    id: field(raw, 'id', isString, 'a string'),
    url: field(raw, 'url', isString, 'a string'),
    httpsUrl: field(raw, 'httpsURL', isString, 'a string'),
    timeCreated,
    isClaimed: field(raw, 'isClaimed', isBoolean, 'a boolean'),
    isPrivate: field(raw, 'isPrivate', isBoolean, 'a boolean'),
    filename: field(raw, 'filename', isString, 'a string'),
    format,
    size: field(raw, 'size', isNumber, 'a number'),
    height: field(raw, 'height', isNumber, 'a number'),
    width: field(raw, 'width', isNumber, 'a number'),
  };
}

function decodeApiError(raw: JsonObject, status: number): ApiErrorBody {
  const { httpStatusCode, cause, message } = raw;
  return {
    httpStatusCode: isNumber(httpStatusCode) ? httpStatusCode : status,
    cause: isString(cause) ? cause : '',
    message: isString(message) ? message : `request failed with status ${status}`,
  };
}

/**
 * Decode the `{metadata, error}` envelope every api response carries. A
 * non-null error wins over the status code; a non-2xx status without one
 * is reported from the status alone.
 */
export function parseEnvelope(body: unknown, status: number, statusText = ''): Metadata | null {
  const envelope: JsonObject = isObject(body) ? body : {};
  const { metadata, error } = envelope;

  if (isObject(error)) {
    throw new OspryError(decodeApiError(error, status));
  }
  if (status < 200 || status >= 300) {
    throw new OspryError({
      httpStatusCode: status,
      cause: statusText,
      message: `request failed with status ${status}`,
    });
  }
  if (!isObject(body)) {
    throw new MetadataDecodeError('response body is not a json object');
  }
  if (metadata === null || metadata === undefined) {
    return null;
  }
  return decodeMetadata(metadata);
}
