import type { TransportRequest } from '@rest-operations/core';
import { IN_PROGRESS_STATUS, PollStrategy, type PollStrategyContext } from './PollStrategy';

/** Header that signals a long-running operation polled through its Location. */
export const LOCATION_HEADER = 'Location';

export interface PollStrategyOptions {
  delayInMilliseconds: number;
  context: PollStrategyContext;
}

/**
 * Resolves a Location value to an absolute URL. Server-relative values are
 * resolved against `baseUrl`; absolute http(s) values are used verbatim.
 */
export function resolveLocation(location: string | null | undefined, baseUrl: string): string | undefined {
  if (!location) return undefined;

  if (location.startsWith('/')) {
    try {
      return new URL(location, baseUrl).toString();
    } catch {
      return undefined;
    }
  }

  const lower = location.toLowerCase();
  if (lower.startsWith('http://') || lower.startsWith('https://')) {
    return location;
  }
  return undefined;
}

/**
 * Polls the URL given by the Location header until the service answers with
 * something other than 202.
 */
export class LocationPollStrategy extends PollStrategy {
  private locationUrl: string;
  private done = false;

  private constructor(context: PollStrategyContext, locationUrl: string, delayInMilliseconds: number) {
    super(context, delayInMilliseconds);
    this.locationUrl = locationUrl;
  }

  /**
   * Creates a strategy when the initial response carries a usable Location
   * header, otherwise returns undefined.
   */
  static tryToCreate(
    originalRequest: TransportRequest,
    initialResponse: Response,
    options: PollStrategyOptions,
  ): LocationPollStrategy | undefined {
    const pollUrl = resolveLocation(initialResponse.headers.get(LOCATION_HEADER), originalRequest.url);
    return pollUrl === undefined
      ? undefined
      : new LocationPollStrategy(
          { ...options.context, originalUrl: options.context.originalUrl ?? originalRequest.url },
          pollUrl,
          options.delayInMilliseconds,
        );
  }

  get pollUrl(): string {
    return this.locationUrl;
  }

  createPollRequest(): TransportRequest {
    return this.createGetRequest(this.locationUrl);
  }

  async updateFrom(response: Response): Promise<Response> {
    if (this.done) return response;

    this.ensureExpectedStatus(response, [IN_PROGRESS_STATUS]);

    if (response.status === IN_PROGRESS_STATUS) {
      this.updateDelayFrom(response);
      const refreshed = resolveLocation(response.headers.get(LOCATION_HEADER), this.locationUrl);
      if (refreshed !== undefined) {
        this.locationUrl = refreshed;
      }
    } else {
      this.done = true;
    }
    return response;
  }

  isDone(): boolean {
    return this.done;
  }
}
