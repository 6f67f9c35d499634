import { ContentTypes } from '../protocol/constants.js';
import { UnsupportedMediaTypeError } from '../protocol/errors.js';
import { PayloadKind } from '../protocol/types.js';

export function contentTypeOf(kind: PayloadKind | string): string {
  switch (kind) {
    case 'text':
      return ContentTypes.text;
    case 'json':
      return ContentTypes.json;
    default:
      // binary is what the service assumes for anything it does not recognize
      return ContentTypes.binary;
  }
}

/** Lower-cased exact match; media type parameters are not accepted */
export function kindOf(contentType: string): PayloadKind {
  switch (contentType.toLowerCase()) {
    case ContentTypes.binary:
      return 'binary';
    case ContentTypes.json:
      return 'json';
    case ContentTypes.text:
      return 'text';
    default:
      throw new UnsupportedMediaTypeError(contentType);
  }
}

export function tryKindOf(contentType: string | undefined): { kind: PayloadKind; ok: boolean } {
  try {
    return { kind: kindOf(contentType || ''), ok: true };
  } catch {
    return { kind: 'binary', ok: false };
  }
}

/** Reads the `dataType` field of a raw user response */
export function parseDataType(value: unknown): PayloadKind {
  if (value === undefined || value === null) return 'binary';
  if (typeof value !== 'string') {
    throw new UnsupportedMediaTypeError(String(value));
  }
  const v = value.trim().toLowerCase();
  if (v === 'binary' || v === 'text' || v === 'json') return v;
  throw new UnsupportedMediaTypeError(value);
}
