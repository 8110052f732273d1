import type { LlmTokenUsage } from './generate-text.js'

export type UsageTotals = {
  calls: number
  promptTokens: number
  completionTokens: number
  totalTokens: number
}

export type UsageTracker = {
  record: (usage: LlmTokenUsage | null) => void
  totals: () => UsageTotals
}

export function createUsageTracker(): UsageTracker {
  const totals: UsageTotals = { calls: 0, promptTokens: 0, completionTokens: 0, totalTokens: 0 }
  return {
    record: (usage) => {
      totals.calls += 1
      if (!usage) return
      const prompt = usage.promptTokens ?? 0
      const completion = usage.completionTokens ?? 0
      totals.promptTokens += prompt
      totals.completionTokens += completion
      totals.totalTokens += usage.totalTokens ?? prompt + completion
    },
    totals: () => ({ ...totals }),
  }
}
