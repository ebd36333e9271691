export class MalformedCycleCountError extends Error {
  readonly name = 'MalformedCycleCountError';
  readonly code = 'MalformedCycleCount';

  constructor(
    readonly line: number,
    readonly payload: string
  ) {
    super(`Malformed cycle count at line ${line}: "${payload}"`);
  }
}
