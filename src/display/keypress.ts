import readline from 'node:readline';

/** Keys that close the frame from the terminal. */
const EXIT_KEYS = new Set(['escape', 'q']);

interface Keypress {
  name?: string;
  ctrl?: boolean;
}

/** process.stdin, or any readable that may be a TTY. */
export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export function isExitKey(key: Keypress | undefined): boolean {
  if (!key?.name) return false;
  if (key.ctrl && key.name === 'c') return true;
  return EXIT_KEYS.has(key.name);
}

/**
 * Listen for Escape / q / Ctrl-C on a TTY. Returns a function that stops listening.
 * Non-TTY input (a service manager, a pipe) is left alone.
 */
export function watchExitKeys(input: KeyInput, onExit: () => void): () => void {
  const setRawMode = input.setRawMode?.bind(input);
  if (!input.isTTY || !setRawMode) return () => undefined;

  readline.emitKeypressEvents(input);
  setRawMode(true);
  input.resume();

  const onKeypress = (_str: string | undefined, key: Keypress | undefined): void => {
    if (isExitKey(key)) onExit();
  };
  input.on('keypress', onKeypress);

  return () => {
    input.off('keypress', onKeypress);
    setRawMode(false);
    input.pause();
  };
}
