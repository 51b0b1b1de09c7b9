import type { HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * Default transport backed by the global fetch API. The whole body is read
 * before returning, so the abort signal also bounds the download.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  const response = await fetch(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body,
    signal,
  });
  const body = await response.arrayBuffer();

  return {
    status: response.status,
    headers: response.headers,
    body,
  };
};
