/**
 * Holds the published corpus snapshot
 *
 * A scan builds a complete snapshot before it replaces the current one in a
 * single assignment. Snapshots are frozen, so a reader holding one sees the
 * same corpus for as long as it keeps the reference.
 */

import { DEFAULT_VISIBILITY } from './ordering.js';
import { ScanCancelledError, type ScanResult } from './scanner.js';
import { serializeCorpus } from './serialize.js';
import type { Corpus, ScanReport, VisibilityOptions } from './types.js';
import { sha256 } from './utils.js';

export interface CorpusSnapshot {
  /** Increases with every scan started */
  generation: number;
  corpus: Corpus;
  report: ScanReport;
  /** SHA-256 of the serialized corpus; equal digests mean equal output */
  digest: string;
}

/** Runs one scan; must reject with ScanCancelledError once the signal aborts */
export type CorpusScanner = (signal: AbortSignal) => Promise<ScanResult>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

export class CorpusStore {
  private snapshot: CorpusSnapshot | null = null;
  private inFlight: AbortController | null = null;
  private generation = 0;

  constructor(
    private readonly scan: CorpusScanner,
    private readonly visibility: VisibilityOptions = DEFAULT_VISIBILITY,
  ) {}

  /** Last published snapshot, or null before the first successful scan */
  current(): CorpusSnapshot | null {
    return this.snapshot;
  }

  /** Whether a scan is running */
  isScanning(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Scan again and publish the result.
   * A scan still in flight is cancelled first. On failure the previous
   * snapshot stays published and the error propagates.
   *
   * @throws {ScanCancelledError} If a newer rescan or cancel() overtook this one
   */
  async rescan(): Promise<CorpusSnapshot> {
    this.inFlight?.abort();
    const controller = new AbortController();
    this.inFlight = controller;
    const generation = ++this.generation;

    try {
      const { corpus, report } = await this.scan(controller.signal);
      if (controller.signal.aborted) {
        throw new ScanCancelledError();
      }

      const snapshot = deepFreeze<CorpusSnapshot>({
        generation,
        corpus,
        report,
        digest: sha256(serializeCorpus(corpus, this.visibility)),
      });
      this.snapshot = snapshot;
      return snapshot;
    } finally {
      if (this.inFlight === controller) {
        this.inFlight = null;
      }
    }
  }

  /** Abort the scan in flight, if any. The published snapshot is kept. */
  cancel(): void {
    this.inFlight?.abort();
  }
}
