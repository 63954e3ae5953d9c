import { JSON_MIME_TYPE } from './codec/jsonCodec';
import type { OperationDescriptor } from './descriptor';
import type { Codec, HttpHeaders, TransportRequest } from './types';

const stripTrailingSlashes = (value: string) => value.replace(/\/+$/, '');

/**
 * Resolves a descriptor against call arguments into the request plan for one
 * invocation: absolute URL with query parameters in declared order, headers,
 * and the JSON-serialized body when one is declared.
 */
export function buildRequest<TArgs, TResult>(
  descriptor: OperationDescriptor<TArgs, TResult>,
  args: TArgs,
  codec: Codec,
  defaultHeaders?: HttpHeaders,
): TransportRequest {
  const scheme = descriptor.scheme(args).replace(/:\/*$/, '');
  const host = stripTrailingSlashes(descriptor.host(args));
  const rawPath = descriptor.path(args);
  const path = !rawPath || rawPath.startsWith('/') ? rawPath : `/${rawPath}`;

  let url = `${scheme}://${host}${path}`;
  const pairs: string[] = [];
  for (const binding of descriptor.query) {
    const value = binding.encodedValue(args);
    if (value === undefined) continue;
    pairs.push(`${binding.name}=${value}`);
  }
  if (pairs.length) {
    url += `${url.includes('?') ? '&' : '?'}${pairs.join('&')}`;
  }

  const headers: HttpHeaders = { ...defaultHeaders };
  for (const binding of descriptor.headers) {
    const value = binding.value(args);
    if (value !== undefined) {
      headers[binding.name] = value;
    }
  }

  const request: TransportRequest = {
    operation: descriptor.name,
    method: descriptor.method,
    url,
    headers,
  };

  const bodyValue = descriptor.body?.(args);
  if (bodyValue !== undefined && bodyValue !== null) {
    request.body = codec.serialize(bodyValue);
    headers['Content-Type'] = JSON_MIME_TYPE;
  }

  return request;
}
