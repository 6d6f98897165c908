import { TypedEventEmitter } from './TypedEventEmitter';

interface TestEvents {
  tick: number;
  label: string;
}

describe('TypedEventEmitter', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('delivers payloads to every handler of an event', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const first = jest.fn();
    const second = jest.fn();
    emitter.on('tick', first);
    emitter.on('tick', second);

    emitter.emit('tick', 7);

    expect(first).toHaveBeenCalledWith(7);
    expect(second).toHaveBeenCalledWith(7);
    expect(emitter.listenerCount('tick')).toBe(2);
    expect(emitter.listenerCount('label')).toBe(0);
  });

  it('unsubscribes through the returned function and off()', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = jest.fn();
    const unsubscribe = emitter.on('tick', handler);
    const other = jest.fn();
    emitter.on('label', other);

    unsubscribe();
    emitter.off('label', other);
    emitter.emit('tick', 1);
    emitter.emit('label', 'x');

    expect(handler).not.toHaveBeenCalled();
    expect(other).not.toHaveBeenCalled();
  });

  it('runs once() handlers a single time', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = jest.fn();
    emitter.once('label', handler);

    emitter.emit('label', 'a');
    emitter.emit('label', 'b');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith('a');
  });

  it('keeps delivering after a handler throws', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const emitter = new TypedEventEmitter<TestEvents>();
    const after = jest.fn();
    emitter.on('tick', () => {
      throw new Error('handler failed');
    });
    emitter.on('tick', after);

    expect(() => emitter.emit('tick', 3)).not.toThrow();
    expect(after).toHaveBeenCalledWith(3);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('removes all listeners', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    emitter.on('tick', jest.fn());
    emitter.on('label', jest.fn());

    emitter.removeAllListeners('tick');
    expect(emitter.listenerCount('tick')).toBe(0);
    expect(emitter.listenerCount('label')).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('label')).toBe(0);
  });
});
