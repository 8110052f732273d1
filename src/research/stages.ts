import type { PipelineStage } from './types.js'

const TRANSITIONS: Record<PipelineStage, readonly PipelineStage[]> = {
  planning: ['aggregating', 'failed'],
  aggregating: ['chunking', 'synthesizing', 'failed'],
  chunking: ['synthesizing', 'failed'],
  synthesizing: ['image-placement', 'done', 'failed'],
  'image-placement': ['done', 'failed'],
  done: [],
  failed: [],
}

export type StageTiming = {
  stage: PipelineStage
  durationMs: number
}

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  return TRANSITIONS[from].includes(to)
}

/**
 * Tracks the current stage and how long each one took. An invalid transition is a bug in
 * the caller and throws.
 */
export class StageTracker {
  private stage: PipelineStage
  private enteredAt: number
  private readonly completed: StageTiming[] = []
  private readonly now: () => number
  private readonly onEnter: ((stage: PipelineStage) => void) | undefined

  constructor({
    initial,
    now = () => Date.now(),
    onEnter,
  }: {
    initial: PipelineStage
    now?: () => number
    onEnter?: (stage: PipelineStage) => void
  }) {
    this.stage = initial
    this.now = now
    this.enteredAt = now()
    this.onEnter = onEnter
    onEnter?.(initial)
  }

  get current(): PipelineStage {
    return this.stage
  }

  transition(next: PipelineStage): void {
    if (!canTransition(this.stage, next)) {
      throw new Error(`Invalid pipeline transition ${this.stage} -> ${next}`)
    }
    const at = this.now()
    this.completed.push({ stage: this.stage, durationMs: at - this.enteredAt })
    this.stage = next
    this.enteredAt = at
    this.onEnter?.(next)
  }

  timings(): StageTiming[] {
    return [...this.completed]
  }
}
