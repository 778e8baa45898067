import { PassThrough } from 'node:stream';
import { isExitKey, watchExitKeys } from '../../src/display/keypress';

describe('Exit keys', () => {
  it('should recognise Escape, q and Ctrl-C', () => {
    expect(isExitKey({ name: 'escape' })).toBe(true);
    expect(isExitKey({ name: 'q' })).toBe(true);
    expect(isExitKey({ name: 'c', ctrl: true })).toBe(true);
  });

  it('should ignore other keys', () => {
    expect(isExitKey({ name: 'c' })).toBe(false);
    expect(isExitKey({ name: 'space' })).toBe(false);
    expect(isExitKey(undefined)).toBe(false);
  });

  it('should call back on an exit key from a TTY', () => {
    const setRawMode = jest.fn();
    const input = Object.assign(new PassThrough(), { isTTY: true, setRawMode });
    const onExit = jest.fn();

    const unwatch = watchExitKeys(input, onExit);
    input.emit('keypress', 'x', { name: 'x' });
    input.emit('keypress', undefined, { name: 'escape' });
    unwatch();

    expect(onExit).toHaveBeenCalledTimes(1);
    expect(setRawMode.mock.calls).toEqual([[true], [false]]);
  });

  it('should leave non-TTY input alone', () => {
    const input = Object.assign(new PassThrough(), { isTTY: false });
    const onExit = jest.fn();

    const unwatch = watchExitKeys(input, onExit);
    input.emit('keypress', 'q', { name: 'q' });
    unwatch();

    expect(onExit).not.toHaveBeenCalled();
  });
});
