import { SingleFlight } from './single-flight.util';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('SingleFlight', () => {
  it('should share one execution between concurrent callers of a key', async () => {
    const flights = new SingleFlight<number>();
    const gate = deferred<number>();
    const fn = jest.fn(() => gate.promise);

    const first = flights.run('USD:JPY', fn);
    const second = flights.run('USD:JPY', fn);
    gate.resolve(149.5);

    await expect(Promise.all([first, second])).resolves.toEqual([149.5, 149.5]);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should run different keys independently', async () => {
    const flights = new SingleFlight<string>();
    const fn = jest.fn((value: string) => Promise.resolve(value));

    await Promise.all([flights.run('a', () => fn('a')), flights.run('b', () => fn('b'))]);

    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should start a new execution once the previous one settled', async () => {
    const flights = new SingleFlight<number>();
    const fn = jest.fn().mockResolvedValueOnce(1).mockResolvedValueOnce(2);

    await expect(flights.run('k', fn)).resolves.toBe(1);
    expect(flights.isInFlight('k')).toBe(false);
    await expect(flights.run('k', fn)).resolves.toBe(2);
  });

  it('should deliver a rejection to every waiter and clear the key', async () => {
    const flights = new SingleFlight<number>();
    const gate = deferred<number>();

    const first = flights.run('k', () => gate.promise);
    const second = flights.run('k', () => gate.promise);
    expect(flights.size).toBe(1);
    gate.reject(new Error('provider down'));

    await expect(first).rejects.toThrow('provider down');
    await expect(second).rejects.toThrow('provider down');
    expect(flights.size).toBe(0);
  });

  it('should turn a synchronous throw into a rejection', async () => {
    const flights = new SingleFlight<number>();

    await expect(
      flights.run('k', () => {
        throw new Error('sync');
      }),
    ).rejects.toThrow('sync');
  });
});
