import type { HttpHeaders, HttpTransport, TransportRequest } from '../types';

export interface AxiosRequestConfigLike {
  url?: string;
  method?: string;
  headers?: Record<string, string>;
  data?: unknown;
  responseType?: 'arraybuffer';
  validateStatus?: (status: number) => boolean;
}

export interface AxiosInstanceLike {
  request(config: AxiosRequestConfigLike): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: unknown;
  }>;
}

type ResponseBody = ConstructorParameters<typeof Response>[0];

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

const toResponseBody = (data: unknown): ResponseBody => {
  if (data === undefined || data === null) return null;
  if (typeof data === 'string' || data instanceof ArrayBuffer || data instanceof Uint8Array) return data;
  throw new TypeError('Unsupported axios response data; expected responseType "arraybuffer"');
};

/**
 * Axios-based HTTP transport.
 * Wraps an axios instance and converts its responses to Fetch API responses.
 * Every status is passed through so the dispatcher can validate it.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest): Promise<Response> => {
    const response = await axiosInstance.request({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    // Normalize headers to plain object
    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (value !== undefined && value !== null) {
        headers[key] = Array.isArray(value) ? value.join(', ') : String(value);
      }
    }

    const body =
      NULL_BODY_STATUSES.has(response.status) || req.method === 'HEAD' ? null : toResponseBody(response.data);
    return new Response(body, { status: response.status, headers });
  };
};
