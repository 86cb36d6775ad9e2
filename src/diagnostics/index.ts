/**
 * Diagnostics channel module.
 *
 * @packageDocumentation
 */

export { DEFAULT_FINDINGS_CAPACITY, DiagnosticsChannel } from './diagnostics.js';
export type { Finding, FindingCode, FindingSeverity } from './diagnostics.js';
