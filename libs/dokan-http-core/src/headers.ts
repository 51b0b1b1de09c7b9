import type { HttpHeaders } from './types';

/**
 * Sets a header, replacing any existing entry whose name differs only in case.
 */
export function setHeader(headers: HttpHeaders, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key !== name && key.toLowerCase() === lower) {
      delete headers[key];
    }
  }
  headers[name] = value;
}
