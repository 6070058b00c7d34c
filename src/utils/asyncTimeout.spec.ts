import { timeoutAsyncCall } from './asyncTimeout';

describe('timeoutAsyncCall', () => {
  it('returns the result of a call that settles in time', async () => {
    await expect(timeoutAsyncCall(Promise.resolve('done'), 100)).resolves.toEqual({ timedOut: false, result: 'done' });
  });

  it('reports a timeout for a call that never settles', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(timeoutAsyncCall(never, 10)).resolves.toEqual({ timedOut: true });
  });

  it('rethrows errors from the call itself', async () => {
    await expect(timeoutAsyncCall(Promise.reject(new Error('call failed')), 100)).rejects.toThrow('call failed');
  });
});
