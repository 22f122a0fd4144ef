/**
 * CLI Version Information
 *
 * Kept in step with package.json.
 *
 * @module cli/version
 */

export const VERSION = '1.0.0';

export function getVersionInfo(): string {
  return `channelscope v${VERSION}`;
}
