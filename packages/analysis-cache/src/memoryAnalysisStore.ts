/**
 * In-process analysis store.
 *
 * Used when no database is configured and in tests. Results are cloned on
 * the way in and out, like a round trip through a real store.
 */

import type { AnalysisKey, AnalysisResult, AnalysisStore } from '@pivot-suite/contracts'
import { keyOf, normalizeKey, serializeKey } from './key.js'

export class MemoryAnalysisStore implements AnalysisStore {
  private entries = new Map<string, AnalysisResult>()

  async read(key: AnalysisKey): Promise<AnalysisResult | null> {
    const stored = this.entries.get(serializeKey(normalizeKey(key)))
    return stored === undefined ? null : structuredClone(stored)
  }

  async upsert(result: AnalysisResult): Promise<void> {
    this.entries.set(serializeKey(normalizeKey(keyOf(result))), structuredClone(result))
  }

  get size(): number {
    return this.entries.size
  }

  clear(): void {
    this.entries.clear()
  }
}
