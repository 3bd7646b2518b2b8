import { createChildLogger } from '../logger.js';
import { toError } from './errors.js';

const log = createChildLogger('http');

/** Releases the socket behind a response whose body will not be read. */
export async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    log.debug({ error: toError(error).message }, 'Failed to cancel response body');
  }
}
