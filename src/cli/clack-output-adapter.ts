/**
 * OutputPort over @clack/prompts for interactive terminals.
 */

import { log, note, spinner } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

/** stop and message are no-ops unless the spinner is running. */
function guardedSpinner(): UnifiedSpinner {
  const clack = spinner();
  let running = false;

  return {
    start(message) {
      if (running) return;
      clack.start(message);
      running = true;
    },
    stop(finalMessage) {
      if (!running) return;
      clack.stop(finalMessage);
      running = false;
    },
    message(text) {
      if (running) clack.message(text);
    }
  };
}

export function createClackOutput(): OutputPort {
  return {
    info: message => log.info(message),
    message: message => log.message(message),
    success: message => log.success(message),
    warn: message => log.warn(message),
    error: message => log.error(message),
    note: (content, title) => note(content, title),
    spinner: guardedSpinner
  };
}
