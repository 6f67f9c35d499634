import * as crypto from 'crypto';

export function signConnectionId(accessKey: string, connectionId: string): string {
  const digest = crypto.createHmac('sha256', accessKey).update(connectionId, 'utf8').digest('hex');
  return `sha256=${digest}`;
}

function safeEqual(a: string, b: string): boolean {
  const ab = Buffer.from(a, 'utf8');
  const bb = Buffer.from(b, 'utf8');
  return ab.length === bb.length && crypto.timingSafeEqual(ab, bb);
}

/**
 * The service signs the connection id with every access key it holds and
 * sends the results comma-separated, so one match against any configured key
 * is enough. No keys configured means signatures are not checked.
 */
export function validateSignature(
  connectionId: string,
  signatureHeader: string | undefined,
  accessKeys: readonly string[]
): boolean {
  if (accessKeys.length === 0) return true;
  if (!signatureHeader) return false;

  const received = signatureHeader
    .split(',')
    .map(s => s.trim().toLowerCase())
    .filter(s => s.length > 0);
  const expected = accessKeys.map(key => signConnectionId(key, connectionId));
  return received.some(sig => expected.some(exp => safeEqual(sig, exp)));
}
