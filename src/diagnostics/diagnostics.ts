/**
 * Advisory findings produced by mixture operations.
 *
 * Findings are kept separate from return values and errors: an operation
 * that records a finding still succeeds. Every finding is also forwarded to
 * the structured logger. Only the most recent findings are retained.
 *
 * @packageDocumentation
 */

import type { ElementKind } from '../keys/index.js';
import type { Logger } from '../logging/index.js';

/**
 * Kinds of advisory findings.
 * - 'mole_fraction_out_of_range': a mole fraction was set outside [0, 1]
 * - 'free_component_fallback': no single free component; concentrations were used
 * - 'interleave_degraded': a derived property could not be blended from components
 */
export type FindingCode =
  | 'mole_fraction_out_of_range'
  | 'free_component_fallback'
  | 'interleave_degraded';

/**
 * Severity of a finding.
 */
export type FindingSeverity = 'info' | 'warning';

/**
 * A single advisory finding.
 */
export interface Finding {
  readonly code: FindingCode;
  readonly severity: FindingSeverity;
  readonly message: string;
  /** Element kind the finding concerns, if any. */
  readonly element?: ElementKind;
  /** Component the finding concerns, if any. */
  readonly component?: string;
  /** Property key the finding concerns, if any. */
  readonly key?: string;
  /** Element instance indices involved, if any. */
  readonly indices?: readonly number[];
}

/**
 * Default number of findings a channel retains.
 */
export const DEFAULT_FINDINGS_CAPACITY = 1000;

/**
 * Accumulates findings for one mixture, keeping at most `capacity` of them.
 * Marks count every finding ever recorded, so they stay valid after older
 * findings are dropped.
 *
 * @example
 * ```typescript
 * const mark = diagnostics.mark();
 * // ... operation that may record findings ...
 * return diagnostics.since(mark);
 * ```
 */
export class DiagnosticsChannel {
  private readonly findings: Finding[] = [];
  private readonly logger: Logger | undefined;
  private readonly capacity: number;
  /** Findings removed from the front of the list, by eviction or drain. */
  private dropped = 0;

  /**
   * Creates an empty channel.
   *
   * @param logger - Logger that receives every recorded finding.
   * @param capacity - Most findings retained; older ones are dropped first.
   * @throws {RangeError} If capacity is not a positive integer.
   */
  constructor(logger?: Logger, capacity: number = DEFAULT_FINDINGS_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Findings capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.logger = logger;
    this.capacity = capacity;
  }

  /**
   * Records a finding.
   *
   * @param finding - The finding to record.
   * @returns The recorded finding.
   */
  record(finding: Finding): Finding {
    this.findings.push(finding);
    if (this.findings.length > this.capacity) {
      this.findings.shift();
      this.dropped += 1;
    }

    const { code, severity, message, ...context } = finding;
    const data = { message, ...context };
    if (severity === 'warning') {
      this.logger?.warn(code, data);
    } else {
      this.logger?.info(code, data);
    }

    return finding;
  }

  /**
   * Gets the retained findings.
   *
   * @returns Retained findings, oldest first.
   */
  getFindings(): readonly Finding[] {
    return this.findings;
  }

  /**
   * Returns a position to pass to {@link DiagnosticsChannel.since}.
   *
   * @returns The number of findings recorded so far.
   */
  mark(): number {
    return this.dropped + this.findings.length;
  }

  /**
   * Gets the findings recorded after a mark.
   *
   * @param mark - Value returned by {@link DiagnosticsChannel.mark}.
   * @returns Retained findings recorded since the mark.
   */
  since(mark: number): readonly Finding[] {
    return this.findings.slice(Math.max(0, mark - this.dropped));
  }

  /**
   * Returns all findings and empties the channel.
   *
   * @returns The findings that were recorded.
   */
  drain(): Finding[] {
    this.dropped += this.findings.length;
    return this.findings.splice(0, this.findings.length);
  }
}
