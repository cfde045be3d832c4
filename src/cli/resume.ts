import readline from 'node:readline/promises';

import type { ResumeSignal } from '../core/checkpoint.js';
import { abortError } from '../core/errors.js';

/**
 * Resume from the login checkpoint when Enter is pressed on stdin.
 * The prompt goes to stderr with the rest of the live log.
 * `onInterrupt` receives Ctrl+C while the prompt owns the terminal.
 */
export function createStdinResume(onInterrupt?: () => void): ResumeSignal {
  return {
    async waitForResume(_gate, signal): Promise<void> {
      if (signal.aborted) throw abortError(signal);

      const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
      if (onInterrupt) rl.on('SIGINT', onInterrupt);

      try {
        await rl.question('\n   Press Enter once you are logged in... ', { signal });
      } catch (err) {
        if (signal.aborted) throw abortError(signal);
        throw err;
      } finally {
        rl.close();
      }
    },
  };
}
