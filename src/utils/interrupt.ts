/**
 * Ctrl-C handling for long-running commands
 */

type SignalSource = Pick<NodeJS.EventEmitter, 'once' | 'off'>;

/**
 * Run `task` with a signal that aborts on the first SIGINT
 *
 * The listener only exists while the task runs, so Ctrl-C keeps Node's
 * default behaviour before and after it.
 */
export async function withInterrupt<T>(
  task: (signal: AbortSignal) => Promise<T>,
  source: SignalSource = process
): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort(new Error('Interrupted'));

  source.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    source.off('SIGINT', onInterrupt);
  }
}
