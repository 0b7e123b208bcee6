export interface DecodedGuardrails {
  maxDecodedSize: number;
  maxDepth: number;
}

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
      case 'bigint':
        return Buffer.byteLength(value.toString(), 'utf8');
      case 'object': {
        if (visited.has(value)) return 0; // avoid cycles
        visited.add(value);
        if (ArrayBuffer.isView(value)) return value.byteLength;
        if (value instanceof Date) return Buffer.byteLength(value.toISOString(), 'utf8');
        if (Array.isArray(value)) {
          let total = 0;
          for (const item of value) total += sizeOf(item);
          return total;
        }
        let total = 0;
        for (const [key, v] of Object.entries(value)) {
          total += Buffer.byteLength(key, 'utf8') + sizeOf(v);
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
  if (obj === null || typeof obj !== 'object' || ArrayBuffer.isView(obj)) {
    return currentDepth;
  }
  const children: unknown[] = Array.isArray(obj) ? obj : Object.values(obj);
  let maxChildDepth = currentDepth;
  for (const child of children) {
    maxChildDepth = Math.max(maxChildDepth, measureDepth(child, currentDepth + 1));
  }
  return maxChildDepth;
}

export type GuardrailCheck =
  | { valid: true }
  | { valid: false; reason: 'decoded_size_exceeded' | 'depth_exceeded'; limit: number; actual: number };

export function checkDecodedPayload(obj: unknown, guardrails: DecodedGuardrails): GuardrailCheck {
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
