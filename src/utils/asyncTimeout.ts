/**
 * Helper to put a time bound on an async call.
 * The underlying call is not cancelled: it is left to settle and its result is ignored.
 */

export interface AsyncTimeoutResult<T> {
  timedOut: boolean;
  result?: T;
}

// Used to tell a timeout apart from errors thrown by the call itself
class TimeoutSignal extends Error {}

export async function timeoutAsyncCall<T>(asyncCall: Promise<T>, timeoutMs: number): Promise<AsyncTimeoutResult<T>> {
  let timeoutReference: NodeJS.Timeout | undefined;

  const timer = new Promise<never>((_resolve, reject) => {
    timeoutReference = setTimeout(() => reject(new TimeoutSignal('Async call timed out')), timeoutMs);
  });

  // A late rejection from the abandoned call must not surface as unhandled
  asyncCall.catch(() => undefined);

  try {
    const result = await Promise.race([asyncCall, timer]);
    return { timedOut: false, result };
  } catch (error) {
    if (error instanceof TimeoutSignal) {
      return { timedOut: true };
    }
    throw error;
  } finally {
    clearTimeout(timeoutReference);
  }
}
