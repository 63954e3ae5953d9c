/**
 * A poll response whose status is neither in progress (202) nor an accepted
 * terminal status.
 */
export class PollRoundError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly pollUrl: string,
    public readonly operation: string,
  ) {
    super(message);
    this.name = 'PollRoundError';
  }
}
