import { render } from "./render"
import type { Mismatch } from "./compare"
import type { OperationEnvelope } from "./types"

/**
 * The first mismatch of a run, attributed to the operation that caused it.
 */
export interface DivergenceReport<Op extends OperationEnvelope>
  extends Mismatch {
  /** 1-based position of the operation in the sequence */
  readonly step: number
  readonly operation: Op
}

export function createDivergenceReport<Op extends OperationEnvelope>(
  mismatch: Mismatch,
  step: number,
  operation: Op
): DivergenceReport<Op> {
  return { ...mismatch, step, operation }
}

/**
 * Render a report as text.
 */
export function formatDivergenceReport(
  report: DivergenceReport<OperationEnvelope>
): string {
  return [
    `━━ Divergence at step ${report.step}: ${report.field} differs ━━`,
    `* Operation:`,
    render(report.operation),
    `━━ Model ${report.field} ━━`,
    report.model,
    `━━ System ${report.field} ━━`,
    report.system,
  ].join(`\n`)
}
