export type OutcomeStatus = 'Success' | 'Failure' | 'TimedOut' | 'TargetUnreachable';

/** Terminal result of one dispatched command. Immutable once produced. */
export interface CommandOutcome {
  readonly status: OutcomeStatus;
  readonly output: string;
  /** True when output was cut to the configured cap (the tail is kept). */
  readonly truncated: boolean;
  readonly exitCode: number | null;
}

/** Correlates a poll with the dispatch that produced it. One per dispatch. */
export interface CommandHandle {
  readonly id: string;
  readonly targetId: string;
}

export function makeOutcome(
  status: OutcomeStatus,
  fields: Partial<Omit<CommandOutcome, 'status'>> = {},
): CommandOutcome {
  return Object.freeze({
    status,
    output: fields.output ?? '',
    truncated: fields.truncated ?? false,
    exitCode: fields.exitCode ?? null,
  });
}

/** Keep at most maxBytes of UTF-8 from the end of text. */
export function truncateOutput(text: string, maxBytes: number): { output: string; truncated: boolean } {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) return { output: text, truncated: false };
  let start = bytes.length - maxBytes;
  // Never start inside a multi-byte character.
  while (start < bytes.length && (bytes[start] & 0xc0) === 0x80) start++;
  return { output: bytes.subarray(start).toString('utf8'), truncated: true };
}
