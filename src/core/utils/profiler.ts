// src/core/utils/profiler.ts

export interface ProfileTiming {
  name: string;
  duration: number;
  maxDuration: number;
  count: number;
  /** Bytes produced or consumed across all calls. */
  bytes: number;
}

/** An open measurement returned by {@link Profiler.begin}. */
export interface ProfileSpan {
  readonly name: string;
  readonly start: number;
}

const DEFAULT_PROFILER_ENABLED =
  Reflect.get(globalThis, "ENABLE_PROFILER") === true ||
  process.env.VNB_PROFILER === "1";

/**
 * Aggregates the wall time and byte volume of codec calls.
 *
 * @remarks
 * Each measurement is carried by the span handed out by `begin`, so nested
 * or re-entrant calls under the same name are timed independently. Only the
 * per-name totals are shared.
 */
export class Profiler {
  private static timings = new Map<string, ProfileTiming>();
  private static enabled = DEFAULT_PROFILER_ENABLED;

  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  static isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Opens a span, or returns null while the profiler is disabled.
   */
  static begin(name: string): ProfileSpan | null {
    return this.enabled ? { name, start: performance.now() } : null;
  }

  /**
   * Closes a span and folds it into the totals for its name.
   *
   * @param span - The span from `begin`; null is ignored.
   * @param bytes - Size of the data the call handled.
   */
  static end(span: ProfileSpan | null, bytes = 0): void {
    if (span === null) return;
    const duration = performance.now() - span.start;

    const timing = this.timings.get(span.name);
    if (!timing) {
      this.timings.set(span.name, {
        name: span.name,
        duration,
        maxDuration: duration,
        count: 1,
        bytes,
      });
      return;
    }
    timing.duration += duration;
    timing.maxDuration = Math.max(timing.maxDuration, duration);
    timing.count++;
    timing.bytes += bytes;
  }

  static getTiming(name: string): ProfileTiming | undefined {
    return this.timings.get(name);
  }

  static getReport(): string {
    const lines = ["=== Codec Timing Report ==="];
    const byName = [...this.timings.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
    for (const t of byName) {
      const kib = (t.bytes / 1024).toFixed(1);
      lines.push(
        `${t.name}: ${t.count} calls, ${t.duration.toFixed(2)}ms total, ${t.maxDuration.toFixed(2)}ms max, ${kib} KiB`,
      );
    }
    return lines.join("\n");
  }

  static reset(): void {
    this.timings.clear();
  }

  static logReport(): void {
    if (!this.enabled) return;
    console.log(this.getReport());
    this.reset();
  }
}
