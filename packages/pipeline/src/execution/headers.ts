export type BodyTransport = 'form' | 'json';

/** Header values must be text: objects and arrays become JSON, everything else `String()`. */
export function normalizeHeaders(headers: Record<string, unknown> | null | undefined): Record<string, string> {
  const normalized: Record<string, string> = {};
  if (!headers) {
    return normalized;
  }
  for (const [name, value] of Object.entries(headers)) {
    if (value !== null && typeof value === 'object') {
      normalized[name] = JSON.stringify(value);
    } else {
      normalized[name] = String(value);
    }
  }
  return normalized;
}

export function headerValue(headers: Record<string, string>, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
}

export function selectBodyTransport(headers: Record<string, string>): BodyTransport {
  const contentType = headerValue(headers, 'content-type') ?? '';
  return contentType.toLowerCase().includes('x-www-form-urlencoded') ? 'form' : 'json';
}
