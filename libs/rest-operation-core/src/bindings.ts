import type { HeaderBinding, QueryBinding, Resolver } from './descriptor';

export type QueryValue = string | number | boolean;

/**
 * Query binding whose value is percent-encoded when resolved. Resolving to
 * `undefined` leaves the parameter out of the URL.
 */
export function queryParam<TArgs>(name: string, value: Resolver<TArgs, QueryValue | undefined>): QueryBinding<TArgs> {
  return {
    name,
    encodedValue: (args) => {
      const resolved = value(args);
      return resolved === undefined ? undefined : encodeURIComponent(String(resolved));
    },
  };
}

/** Query binding for a value the caller has already encoded. */
export function encodedQueryParam<TArgs>(name: string, encodedValue: Resolver<TArgs, string | undefined>): QueryBinding<TArgs> {
  return { name, encodedValue };
}

export function header<TArgs>(name: string, value: string | Resolver<TArgs, string | undefined>): HeaderBinding<TArgs> {
  return {
    name,
    value: typeof value === 'string' ? () => value : value,
  };
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Path resolver for templates such as `/widgets/{id}/parts/{partId}`.
 * Substituted values are percent-encoded.
 */
export function pathTemplate<TArgs>(
  template: string,
  values: Resolver<TArgs, Record<string, QueryValue | undefined>>,
): Resolver<TArgs, string> {
  return (args) => {
    const resolved = values(args);
    return template.replace(PLACEHOLDER, (_match, name: string) => {
      const value = resolved[name];
      if (value === undefined) {
        throw new Error(`Missing value for path parameter "${name}" in ${template}`);
      }
      return encodeURIComponent(String(value));
    });
  };
}
