import ora from 'ora';
import type { Ora } from 'ora';

export function createSpinner(text: string, enabled = true): Ora {
  return ora({ text, spinner: 'dots', isEnabled: enabled });
}

/**
 * Run `fn` behind a spinner. Pass `enabled: false` when other output (verbose
 * logging) would be interleaved with the spinner frames.
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  options: { enabled?: boolean } = {},
): Promise<T> {
  const spinner = createSpinner(text, options.enabled ?? true);
  spinner.start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
