/** The run was cancelled (SIGINT, or an aborted signal) before it finished. */
export class RunAbortedError extends Error {
  readonly exitCode = 2;

  constructor(message = 'Run aborted') {
    super(message);
    this.name = 'RunAbortedError';
  }
}

/** Turn an abort reason into the error the engine raises. */
export function abortError(signal: AbortSignal): RunAbortedError {
  const reason: unknown = signal.reason;
  if (reason instanceof RunAbortedError) return reason;
  if (reason instanceof Error) return new RunAbortedError(reason.message);
  return new RunAbortedError(typeof reason === 'string' ? reason : undefined);
}
