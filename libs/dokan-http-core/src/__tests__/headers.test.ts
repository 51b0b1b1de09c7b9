import { describe, it, expect } from 'vitest';
import { setHeader } from '../headers';
import type { HttpHeaders } from '../types';

describe('setHeader', () => {
  it('replaces an entry whose name differs only in case', () => {
    const headers: HttpHeaders = { authorization: 'Basic old', Accept: 'application/json' };

    setHeader(headers, 'Authorization', 'Bearer test-token');

    expect(headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-token' });
  });
});
