export interface CalibrationBin {
  lower: number;
  upper: number;
  count: number;
  meanPredicted: number | null;
  observedRate: number | null;
}

export interface MetricSummary {
  events: number;
  entrants: number;
  logLoss: number | null;
  brier: number | null;
  topPickHitRate: number | null;
  calibration: CalibrationBin[];
}

interface BinTotals {
  count: number;
  predicted: number;
  wins: number;
}

/**
 * Running sums for log-loss, multi-class Brier, top-pick hit rate and calibration bins. Sums
 * rather than means, so fold accumulators merge into an exact aggregate.
 */
export class MetricAccumulator {
  private events = 0;
  private entrants = 0;
  private logLossSum = 0;
  private brierSum = 0;
  private topPickHits = 0;
  private readonly bins: BinTotals[];

  constructor(
    private readonly binCount = 10,
    private readonly probabilityFloor = 1e-15
  ) {
    this.bins = Array.from({ length: binCount }, () => ({ count: 0, predicted: 0, wins: 0 }));
  }

  /** Returns true when the winner's probability had to be floored for the log-loss. */
  add(probabilities: readonly number[], winnerIndex: number): { clipped: boolean } {
    if (winnerIndex < 0 || winnerIndex >= probabilities.length) {
      throw new RangeError(`winner index ${winnerIndex} outside 0..${probabilities.length - 1}`);
    }
    const pWinner = probabilities[winnerIndex];
    const clipped = pWinner < this.probabilityFloor;

    this.events += 1;
    this.entrants += probabilities.length;
    this.logLossSum += -Math.log(Math.max(pWinner, this.probabilityFloor));

    let top = 0;
    probabilities.forEach((p, i) => {
      const y = i === winnerIndex ? 1 : 0;
      this.brierSum += (p - y) * (p - y);
      if (p > probabilities[top]) top = i;
      const bin = this.bins[Math.min(this.binCount - 1, Math.floor(p * this.binCount))];
      bin.count += 1;
      bin.predicted += p;
      bin.wins += y;
    });
    if (top === winnerIndex) this.topPickHits += 1;

    return { clipped };
  }

  merge(other: MetricAccumulator): this {
    if (other.binCount !== this.binCount) throw new RangeError('cannot merge accumulators with different bins');
    this.events += other.events;
    this.entrants += other.entrants;
    this.logLossSum += other.logLossSum;
    this.brierSum += other.brierSum;
    this.topPickHits += other.topPickHits;
    other.bins.forEach((bin, i) => {
      this.bins[i].count += bin.count;
      this.bins[i].predicted += bin.predicted;
      this.bins[i].wins += bin.wins;
    });
    return this;
  }

  summary(): MetricSummary {
    const perEvent = (sum: number) => (this.events ? sum / this.events : null);
    return {
      events: this.events,
      entrants: this.entrants,
      logLoss: perEvent(this.logLossSum),
      brier: perEvent(this.brierSum),
      topPickHitRate: perEvent(this.topPickHits),
      calibration: this.bins.map((bin, i) => ({
        lower: i / this.binCount,
        upper: (i + 1) / this.binCount,
        count: bin.count,
        meanPredicted: bin.count ? bin.predicted / bin.count : null,
        observedRate: bin.count ? bin.wins / bin.count : null,
      })),
    };
  }
}
