import type { HttpTransport, TransportRequest } from '../types';

/**
 * Fetch-based HTTP transport using the global fetch API.
 */
export const fetchTransport: HttpTransport = (req: TransportRequest): Promise<Response> =>
  fetch(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body,
  });
