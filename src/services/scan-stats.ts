import type { Assessment } from "../types"

export interface ScanCounts {
  safe: number
  unsafe: number
  unknown: number
  opaque: number
}

/** Process-lifetime tally of assessments by outcome. */
export class ScanStats {
  private readonly counts: ScanCounts = { safe: 0, unsafe: 0, unknown: 0, opaque: 0 }

  record(assessment: Assessment): void {
    if (assessment.kind === "opaque") {
      this.counts.opaque += 1
      return
    }

    switch (assessment.verdict.isSafe) {
      case "SAFE":
        this.counts.safe += 1
        break
      case "UNSAFE":
        this.counts.unsafe += 1
        break
      case "UNKNOWN":
        this.counts.unknown += 1
        break
    }
  }

  snapshot(): ScanCounts {
    return { ...this.counts }
  }
}
