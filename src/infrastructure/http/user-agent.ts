import { VERSION } from '../../version.js';

const BASE_USER_AGENT = `telemetry-transmission/${VERSION}`;

/**
 * Versioned client identifier, optionally followed by a caller-supplied
 * token (surrounding whitespace trimmed, ignored when blank).
 */
export function buildUserAgent(addition = ''): string {
  const extra = addition.trim();
  return extra === '' ? BASE_USER_AGENT : `${BASE_USER_AGENT} ${extra}`;
}
