import type { ZodIssue } from 'zod';
import { SerializationError } from '../errors';
import type { Codec, Shape } from '../types';

export const JSON_MIME_TYPE = 'application/json';

const describeIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '<root>'}: ${issue.message}`).join('; ');

/**
 * JSON codec validating decoded values against zod schemas.
 *
 * An empty body decodes as `null`, so only shapes that admit `null` accept it.
 */
export class JsonCodec implements Codec {
  serialize(value: unknown): string {
    let text: string | undefined;
    try {
      text = JSON.stringify(value);
    } catch (error) {
      throw new SerializationError(
        `Unable to serialize value: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }
    if (text === undefined) {
      throw new SerializationError(`Unable to serialize value of type ${typeof value}`);
    }
    return text;
  }

  deserialize<T>(text: string, shape: Shape<T>): T {
    let parsed: unknown = null;
    if (text.trim()) {
      try {
        parsed = JSON.parse(text);
      } catch (error) {
        throw new SerializationError(
          `Body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
          error,
        );
      }
    }

    const result = shape.safeParse(parsed);
    if (!result.success) {
      throw new SerializationError(`Body does not match the declared shape: ${describeIssues(result.error.issues)}`, result.error);
    }
    return result.data;
  }
}

export const jsonCodec: Codec = new JsonCodec();
