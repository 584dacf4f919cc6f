/**
 * Version string reported by `pipeline --version`. Kept in step with package.json.
 *
 * @module cli/version
 */

export const VERSION = '1.0.0';

/**
 * One-line banner for the tool.
 */
export function getVersionInfo(): string {
  return `Yearly data pipeline v${VERSION}`;
}
