// Result of one enrichment call. Adapters return these instead of throwing so
// the synthesizer can decide per field what to degrade.
export type Outcome<T> =
  | { status: 'found'; value: T }
  | { status: 'absent'; reason?: string }
  | { status: 'failed'; error: string };

export function found<T>(value: T): Outcome<T> {
  return { status: 'found', value };
}

export function absent<T = never>(reason?: string): Outcome<T> {
  return reason === undefined ? { status: 'absent' } : { status: 'absent', reason };
}

export function failed<T = never>(error: unknown): Outcome<T> {
  return { status: 'failed', error: describeError(error) };
}

export function valueOr<T>(outcome: Outcome<T>, fallback: T): T {
  return outcome.status === 'found' ? outcome.value : fallback;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
