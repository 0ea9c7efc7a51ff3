import { ProgressTracker, parsePhaseWeights } from './progress-tracker';

describe('ProgressTracker', () => {
  it('maps phase progress into weighted slices', () => {
    const tracker = new ProgressTracker();

    expect(tracker.report('analyze', 100).percentage).toBe(2);
    expect(tracker.report('transform', 50).percentage).toBe(50);
    expect(tracker.report('reassemble', 50).percentage).toBe(90);
  });

  it('never reports a lower value than before', () => {
    const tracker = new ProgressTracker();
    tracker.report('transform', 50);

    expect(tracker.report('analyze', 0).percentage).toBe(50);
    expect(tracker.report('transform', 10).percentage).toBe(50);
    expect(tracker.percentage).toBe(50);
  });

  it('estimates remaining time from elapsed time', () => {
    let now = 1_000;
    const tracker = new ProgressTracker(undefined, () => now);

    expect(tracker.report('analyze', 0).estimatedTimeRemainingMs).toBeNull();
    now = 11_000;
    expect(tracker.report('transform', 50).estimatedTimeRemainingMs).toBe(10_000);
    expect(tracker.report('reassemble', 100).estimatedTimeRemainingMs).toBe(0);
  });

  it('normalizes custom weights to 100', () => {
    const tracker = new ProgressTracker({
      analyze: 0,
      'extract-audio': 0,
      'extract-frames': 0,
      transform: 1,
      reassemble: 1,
    });

    expect(tracker.report('transform', 100).percentage).toBe(50);
  });
});

describe('parsePhaseWeights', () => {
  it('returns the defaults when unset', () => {
    expect(parsePhaseWeights(undefined).transform).toBe(60);
  });

  it('overrides the listed phases only', () => {
    expect(parsePhaseWeights('{"transform": 70, "reassemble": 10}')).toEqual({
      analyze: 2,
      'extract-audio': 3,
      'extract-frames': 15,
      transform: 70,
      reassemble: 10,
    });
  });

  it('rejects unknown phases and negative weights', () => {
    expect(() => parsePhaseWeights('{"upload": 5}')).toThrow(
      'Unknown progress phase: upload',
    );
    expect(() => parsePhaseWeights('{"transform": -1}')).toThrow(
      'Invalid weight for phase transform',
    );
  });
});
