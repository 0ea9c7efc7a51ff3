import { StageProgress } from './pipeline.interfaces';

const FRAME_COUNTER_PATTERN = /Frame:\s*(\d+)\/(\d+)/;
const ENCODER_FRAME_PATTERN = /frame=\s*(\d+)/;
const ENCODER_TIME_PATTERN = /time=\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/;

function percentage(current: number, total: number): number {
  return Math.min((current / total) * 100, 100);
}

/** Parses `Frame: 250/1000` style counters. */
export function parseFrameProgress(line: string): StageProgress | undefined {
  const match = FRAME_COUNTER_PATTERN.exec(line);
  if (!match) {
    return undefined;
  }
  const currentFrame = parseInt(match[1], 10);
  const totalFrames = parseInt(match[2], 10);
  if (totalFrames <= 0) {
    return undefined;
  }
  return {
    percentage: percentage(currentFrame, totalFrames),
    currentFrame,
    totalFrames,
  };
}

export interface EncoderTotals {
  totalFrames?: number | null;
  durationSeconds?: number | null;
}

/**
 * Parses encoder status lines (`frame=  120 ... time=00:00:05.00`). Needs the
 * total frame count or the input duration; capped below 100 until exit.
 */
export function parseEncoderProgress(
  line: string,
  totals: EncoderTotals,
): StageProgress | undefined {
  const frameMatch = ENCODER_FRAME_PATTERN.exec(line);
  const currentFrame = frameMatch ? parseInt(frameMatch[1], 10) : undefined;

  if (currentFrame !== undefined && totals.totalFrames) {
    return {
      percentage: Math.min(percentage(currentFrame, totals.totalFrames), 99.9),
      currentFrame,
      totalFrames: totals.totalFrames,
    };
  }

  const timeMatch = ENCODER_TIME_PATTERN.exec(line);
  if (timeMatch && totals.durationSeconds) {
    const [, hours, minutes, seconds] = timeMatch;
    const currentTime =
      parseInt(hours, 10) * 3600 + parseInt(minutes, 10) * 60 + parseFloat(seconds);
    return {
      percentage: Math.min(percentage(currentTime, totals.durationSeconds), 99.9),
      currentFrame,
    };
  }

  return undefined;
}
