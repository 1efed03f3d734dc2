import { chunk, raceWithSignal, toError } from './async.utils';

describe('async.utils', () => {
  describe('chunk', () => {
    it('should split into batches of the given size', () => {
      expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    });

    it('should return no batches for an empty array', () => {
      expect(chunk([], 100)).toEqual([]);
    });

    it('should reject a non-positive size', () => {
      expect(() => chunk([1], 0)).toThrow('Chunk size must be positive');
    });
  });

  describe('raceWithSignal', () => {
    it('should return the promise untouched without a signal', async () => {
      await expect(raceWithSignal(Promise.resolve(42))).resolves.toBe(42);
    });

    it('should resolve with the promise value when the signal stays idle', async () => {
      const controller = new AbortController();
      await expect(raceWithSignal(Promise.resolve('ok'), controller.signal)).resolves.toBe('ok');
    });

    it('should reject with the abort reason while the promise is pending', async () => {
      const controller = new AbortController();
      let release: (value: string) => void = () => undefined;
      const pending = new Promise<string>((resolve) => {
        release = resolve;
      });

      const raced = raceWithSignal(pending, controller.signal);
      controller.abort(new Error('client went away'));

      await expect(raced).rejects.toThrow('client went away');
      release('late');
      await expect(pending).resolves.toBe('late');
    });

    it('should reject immediately for an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(raceWithSignal(Promise.resolve(1), controller.signal)).rejects.toBeInstanceOf(Error);
    });

    it('should propagate the promise rejection', async () => {
      const controller = new AbortController();
      await expect(
        raceWithSignal(Promise.reject(new Error('boom')), controller.signal),
      ).rejects.toThrow('boom');
    });
  });

  describe('toError', () => {
    it('should keep Error instances and wrap other values', () => {
      const error = new Error('kept');
      expect(toError(error)).toBe(error);
      expect(toError('text').message).toBe('text');
    });
  });
});
