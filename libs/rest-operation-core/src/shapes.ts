import { z } from 'zod';
import { RestError } from './errors';
import type { Codec, Shape } from './types';

export type ResponseBodyKind = 'none' | 'rawStream' | 'rawBytes' | 'typed';

/**
 * Declared success-body shape. The decoder is bound when the descriptor is
 * defined, so dispatch never inspects the declared type at call time.
 */
export interface ResponseBodyShape<T> {
  readonly kind: ResponseBodyKind;
  decode(response: Response, codec: Codec): Promise<T>;
}

export type ResponseStream = Response['body'];

/**
 * Cancels a response body nobody is going to read so the transport can release
 * its connection. Bodies already read or locked are left alone.
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed && !response.body.locked) {
    await response.body.cancel();
  }
}

export const responseBody = {
  /** No result; also the only shape allowed for HEAD and fire-and-forget operations. */
  none: (): ResponseBodyShape<null> => ({
    kind: 'none',
    decode: async (response) => {
      await discardBody(response);
      return null;
    },
  }),

  /** The response byte stream, left unread. */
  stream: (): ResponseBodyShape<ResponseStream> => ({
    kind: 'rawStream',
    decode: async (response) => response.body,
  }),

  bytes: (): ResponseBodyShape<Uint8Array> => ({
    kind: 'rawBytes',
    decode: async (response) => new Uint8Array(await response.arrayBuffer()),
  }),

  typed: <T>(shape: Shape<T>): ResponseBodyShape<T> => ({
    kind: 'typed',
    decode: async (response, codec) => codec.deserialize(await response.text(), shape),
  }),
};

export type ErrorFactory<TBody> = (message: string, response: Response, body: TBody | undefined) => Error;

/**
 * Declared error kind of an operation: the error-body shape together with the
 * factory that builds the error value.
 */
export interface ErrorKind {
  readonly name: string;
  /**
   * Decodes `text` (when non-empty) into the declared error-body shape and
   * returns the constructor bound to the decoded body. Decoding failures throw
   * from here; construction failures throw from the returned function.
   */
  prepare(text: string | undefined, codec: Codec): (message: string, response: Response) => Error;
}

export function defineErrorKind<TBody>(name: string, bodyShape: Shape<TBody>, create: ErrorFactory<TBody>): ErrorKind {
  return Object.freeze({
    name,
    prepare(text: string | undefined, codec: Codec) {
      const body = text ? codec.deserialize(text, bodyShape) : undefined;
      return (message: string, response: Response) => create(message, response, body);
    },
  });
}

export const restErrorKind: ErrorKind = defineErrorKind(
  'RestError',
  z.unknown(),
  (message, response, body) => new RestError(message, response, body),
);
