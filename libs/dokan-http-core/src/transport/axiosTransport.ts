import type { HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/** The slice of an axios instance the transport relies on. */
export interface AxiosInstanceLike {
  request(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: unknown;
  }>;
}

/**
 * Adapts an axios instance (or anything shaped like one) into a transport.
 * Every status is accepted so that error responses reach the classifier.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const response = await axiosInstance.request({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    const headers = new Headers();
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (Array.isArray(value)) {
        for (const item of value) {
          headers.append(key, String(item));
        }
      } else if (value !== undefined && value !== null) {
        headers.set(key, String(value));
      }
    }

    return {
      status: response.status,
      headers,
      body: toBytes(response.data),
    };
  };
};

// Adapters configured without responseType may hand back text or parsed JSON.
function toBytes(data: unknown): ArrayBuffer | Uint8Array {
  if (data instanceof ArrayBuffer || data instanceof Uint8Array) {
    return data;
  }
  if (data === undefined || data === null) {
    return new Uint8Array();
  }
  return new TextEncoder().encode(typeof data === 'string' ? data : JSON.stringify(data));
}
