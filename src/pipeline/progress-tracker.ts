import {
  PROGRESS_PHASES,
  ProgressPhase,
  isProgressPhase,
} from '../jobs/interfaces/job.interface';

export type PhaseWeights = Record<ProgressPhase, number>;

export const DEFAULT_PHASE_WEIGHTS: Readonly<PhaseWeights> = {
  analyze: 2,
  'extract-audio': 3,
  'extract-frames': 15,
  transform: 60,
  reassemble: 20,
};

export interface ProgressSnapshot {
  phase: ProgressPhase;
  percentage: number;
  estimatedTimeRemainingMs: number | null;
}

/**
 * Reads a JSON object of phase weights, e.g. `{"transform": 70}`. Missing
 * phases keep their default weight.
 */
export function parsePhaseWeights(raw: string | undefined): PhaseWeights {
  const weights: PhaseWeights = { ...DEFAULT_PHASE_WEIGHTS };
  if (!raw) {
    return weights;
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Progress weights must be a JSON object');
  }
  for (const [phase, value] of Object.entries(parsed)) {
    const weight: unknown = value;
    if (!isProgressPhase(phase)) {
      throw new Error(`Unknown progress phase: ${phase}`);
    }
    if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
      throw new Error(`Invalid weight for phase ${phase}`);
    }
    weights[phase] = weight;
  }
  if (PROGRESS_PHASES.every((phase) => weights[phase] === 0)) {
    throw new Error('At least one progress phase needs a weight');
  }
  return weights;
}

/**
 * Maps per-phase progress onto one 0-100 scale. Each phase owns a slice
 * proportional to its weight; the overall value never decreases.
 */
export class ProgressTracker {
  private readonly offsets = new Map<ProgressPhase, number>();
  private readonly slices = new Map<ProgressPhase, number>();
  private readonly startedAt: number;
  private current = 0;

  constructor(
    weights: Readonly<PhaseWeights> = DEFAULT_PHASE_WEIGHTS,
    private readonly now: () => number = Date.now,
  ) {
    const total = PROGRESS_PHASES.reduce((sum, phase) => sum + weights[phase], 0);
    let offset = 0;
    for (const phase of PROGRESS_PHASES) {
      const slice = (weights[phase] / total) * 100;
      this.offsets.set(phase, offset);
      this.slices.set(phase, slice);
      offset += slice;
    }
    this.startedAt = now();
  }

  get percentage(): number {
    return this.current;
  }

  report(phase: ProgressPhase, phasePercentage: number): ProgressSnapshot {
    const clamped = Math.min(Math.max(phasePercentage, 0), 100);
    const offset = this.offsets.get(phase) ?? 0;
    const slice = this.slices.get(phase) ?? 0;
    const overall = Math.round((offset + (slice * clamped) / 100) * 100) / 100;
    this.current = Math.min(Math.max(this.current, overall), 100);

    return {
      phase,
      percentage: this.current,
      estimatedTimeRemainingMs: this.estimateRemaining(),
    };
  }

  private estimateRemaining(): number | null {
    if (this.current >= 100) {
      return 0;
    }
    if (this.current <= 0) {
      return null;
    }
    const elapsed = this.now() - this.startedAt;
    return Math.round((elapsed / this.current) * (100 - this.current));
  }
}
