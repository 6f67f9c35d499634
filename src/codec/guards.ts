export interface DecodedGuardrails {
  maxDecodedSize: number;
  maxDepth: number;
}

export const DEFAULT_STATE_GUARDRAILS: DecodedGuardrails = {
  maxDecodedSize: 65536,
  maxDepth: 16,
};

export function measureDecodedSize(obj: unknown): number {
  const visited = new Set<object>();

  function sizeOf(value: unknown): number {
    if (value === null || value === undefined) return 0;
    switch (typeof value) {
      case 'string':
        return Buffer.byteLength(value, 'utf8');
      case 'number':
        return 8; // approximate
      case 'boolean':
        return 1;
      case 'object': {
        if (visited.has(value)) return 0;
        visited.add(value);
        if (Array.isArray(value)) {
          let total = 0;
          for (const item of value) total += sizeOf(item);
          return total;
        }
        let total = 0;
        for (const [key, child] of Object.entries(value)) {
          total += Buffer.byteLength(key, 'utf8') + sizeOf(child);
        }
        return total;
      }
      default:
        return 0;
    }
  }

  return sizeOf(obj);
}

export function measureDepth(obj: unknown, currentDepth = 0): number {
  if (obj === null || typeof obj !== 'object') {
    return currentDepth;
  }

  let maxChildDepth = currentDepth;
  const children = Array.isArray(obj) ? obj : Object.values(obj);
  for (const child of children) {
    maxChildDepth = Math.max(maxChildDepth, measureDepth(child, currentDepth + 1));
  }
  return maxChildDepth;
}

export function checkDecodedPayload(
  obj: unknown,
  guardrails: DecodedGuardrails
): { valid: true } | { valid: false; reason: string; limit: number; actual: number } {
  const size = measureDecodedSize(obj);
  if (size > guardrails.maxDecodedSize) {
    return {
      valid: false,
      reason: 'decoded_size_exceeded',
      limit: guardrails.maxDecodedSize,
      actual: size
    };
  }

  const depth = measureDepth(obj);
  if (depth > guardrails.maxDepth) {
    return {
      valid: false,
      reason: 'depth_exceeded',
      limit: guardrails.maxDepth,
      actual: depth
    };
  }

  return { valid: true };
}
