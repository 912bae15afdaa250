import { displayStatistics } from '../cli/display/statistics';
import { ValidationError } from '../utils/errors';
import { Learner } from './learner';
import { LearnerStatistics } from './types';

interface Series {
  name: string;
  accumulatedRewards: number[];
  knownStates: number[];
  temperatures: number[];
}

/**
 * Records per-trial statistics for a set of learners.
 *
 * Rewards go through {@link PerformanceCounter.setReward}, which records a
 * terminal reward and then hands the call to the learner unchanged, so a
 * monitored learner learns exactly what an unmonitored one would.
 */
export class PerformanceCounter<S, A> {
  private readonly series = new Map<Learner<S, A>, Series>();

  constructor(readonly learners: readonly Learner<S, A>[], names?: readonly string[]) {
    if (names !== undefined && names.length !== learners.length) {
      throw new ValidationError('Expected one name per learner', {
        learners: learners.length,
        names: names.length,
      });
    }

    learners.forEach((learner, i) => {
      this.series.set(learner, {
        name: names?.[i] ?? `Learner ${i}`,
        accumulatedRewards: [],
        knownStates: [],
        temperatures: [],
      });
    });
  }

  setReward(learner: Learner<S, A>, reward: number, terminal = false): void {
    if (terminal) {
      this.record(learner, reward);
    }
    learner.setReward(reward, terminal);
  }

  /**
   * Append one trial's data points. Called before the learner counts the trial,
   * so the temperature is the one the finished trial ran at.
   */
  record(learner: Learner<S, A>, reward: number): void {
    const series = this.seriesFor(learner);
    const previous = series.accumulatedRewards[series.accumulatedRewards.length - 1] ?? 0;

    series.accumulatedRewards.push(previous + reward);
    series.knownStates.push(learner.knownStateCount);
    series.temperatures.push(learner.temperatureFunction(learner.trials));
  }

  statistics(): LearnerStatistics[] {
    return this.learners.map(learner => {
      const series = this.seriesFor(learner);
      return {
        name: series.name,
        trials: learner.trials,
        accumulatedRewards: [...series.accumulatedRewards],
        knownStates: [...series.knownStates],
        temperatures: [...series.temperatures],
      };
    });
  }

  showStatistics(): void {
    displayStatistics(this.statistics());
  }

  private seriesFor(learner: Learner<S, A>): Series {
    const series = this.series.get(learner);
    if (!series) {
      throw new ValidationError(`Learner ${learner.name} is not monitored by this counter`);
    }
    return series;
  }
}
