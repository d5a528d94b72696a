import { SimulationProgress } from "./types";

export const PROGRESS_STEPS = 20;

/**
 * Fires roughly every 1/20th of `maxDraws`. Below 20 draws the interval
 * floors to one, so every draw reports.
 */
export class ProgressTracker {
  private readonly interval: number;
  private nextReport: number;

  constructor(private readonly maxDraws: number, private readonly onProgress?: (progress: SimulationProgress) => void) {
    this.interval = Math.max(1, Math.floor(maxDraws / PROGRESS_STEPS));
    this.nextReport = this.interval;
  }

  record(draws: number): void {
    if (!this.onProgress || draws < this.nextReport) {
      return;
    }
    this.onProgress({
      draws,
      maxDraws: this.maxDraws,
      step: Math.floor((draws / this.maxDraws) * PROGRESS_STEPS),
      steps: PROGRESS_STEPS,
    });
    this.nextReport += this.interval;
  }
}
