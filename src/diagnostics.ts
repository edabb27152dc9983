/**
 * Diagnostics - structured notes about recovered anomalies
 *
 * Nothing here is an error: every entry describes something the core
 * recovered from (a failed sample, a numeric fallback). Callers that care
 * pass a sink through the options; everyone else gets the no-op sink.
 */

export type DiagnosticCode =
  | "evaluation-failed"
  | "integration-fallback"
  | "formula-unavailable"
  | "degenerate-function";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  detail?: Record<string, string | number>;
}

export interface DiagnosticSink {
  record(diagnostic: Diagnostic): void;
}

/** Sink that drops everything */
export const silentSink: DiagnosticSink = {
  record: () => {},
};

/**
 * Collecting sink. Keeps the first `maxEntries` diagnostics of each code and
 * counts the rest, so a function that fails at every sample does not produce
 * thousands of entries.
 */
export class Diagnostics implements DiagnosticSink {
  private readonly kept: Diagnostic[] = [];
  private readonly counts = new Map<DiagnosticCode, number>();

  constructor(private readonly maxEntries = 20) {}

  record(diagnostic: Diagnostic): void {
    const seen = this.counts.get(diagnostic.code) ?? 0;
    this.counts.set(diagnostic.code, seen + 1);
    if (seen < this.maxEntries) {
      this.kept.push(diagnostic);
    }
  }

  get entries(): readonly Diagnostic[] {
    return this.kept;
  }

  /** Total recorded for a code, including entries beyond `maxEntries` */
  count(code: DiagnosticCode): number {
    return this.counts.get(code) ?? 0;
  }

  /** One line per code: "evaluation-failed ×12: <first message>" */
  summarize(): string[] {
    const lines: string[] = [];
    for (const [code, total] of this.counts) {
      const first = this.kept.find((d) => d.code === code);
      lines.push(`${code} ×${total}: ${first?.message ?? ""}`.trimEnd());
    }
    return lines;
  }
}
