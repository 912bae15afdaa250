/**
 * PerformanceCounter Tests
 */

import { renderStatistics } from '../../../src/cli/display/statistics';
import { SoftmaxStrategy } from '../../../src/rl/exploration/softmax';
import { Learner } from '../../../src/rl/learner';
import { PerformanceCounter } from '../../../src/rl/performance-counter';
import { createRandom } from '../../../src/rl/random';
import { TDLearner } from '../../../src/rl/td-learner';
import { makeExponentialTemperature } from '../../../src/rl/temperature';
import { ValidationError } from '../../../src/utils/errors';

type Move = 'go' | 'wait';

const buildLearner = (seed = 'monitor') =>
  new TDLearner<string, Move>({
    exploration: new SoftmaxStrategy(createRandom(seed)),
    discountFactor: 0.9,
    temperatureFunction: makeExponentialTemperature(1, 0.5),
    actions: state => (state === 'end' ? [] : ['go', 'wait']),
  });

const snapshot = (learner: Learner<string, Move>) =>
  learner.qTable.states().map(state => [state, [...learner.qTable.actionValues(state)]]);

describe('PerformanceCounter', () => {
  describe('setReward', () => {
    it('should record terminal rewards before the learner counts the trial', () => {
      // Arrange
      const learner = buildLearner();
      const counter = new PerformanceCounter([learner]);

      // Act - s1 is known from the first step, before any table entry exists
      learner.step('s1');
      counter.setReward(learner, 3, true);
      learner.resetEpisode();
      learner.step('s1');
      counter.setReward(learner, 2, true);

      // Assert
      const [stats] = counter.statistics();
      expect(stats.name).toBe('Learner 0');
      expect(stats.trials).toBe(2);
      expect(stats.accumulatedRewards).toEqual([3, 5]);
      expect(stats.knownStates).toEqual([1, 1]);
      expect(stats.temperatures[0]).toBe(1);
      expect(stats.temperatures[1]).toBeCloseTo(Math.exp(-0.5), 10);
    });

    it('should count the state just stepped into as known', () => {
      const learner = buildLearner();
      const counter = new PerformanceCounter([learner]);

      learner.step('s1');
      counter.setReward(learner, 1, true);

      expect(counter.statistics()[0].knownStates).toEqual([1]);
    });

    it('should delegate non-terminal rewards without recording', () => {
      const learner = buildLearner();
      const counter = new PerformanceCounter([learner], ['solo']);
      learner.step('s1');

      counter.setReward(learner, 0.5);

      expect(learner.lastReward).toBe(0.5);
      expect(learner.trials).toBe(0);
      expect(counter.statistics()[0].accumulatedRewards).toEqual([]);
    });

    it('should call the learner with the original arguments', () => {
      const learner = buildLearner();
      const setRewardSpy = jest.spyOn(learner, 'setReward');
      const counter = new PerformanceCounter([learner]);

      counter.setReward(learner, -1, true);

      expect(setRewardSpy).toHaveBeenCalledTimes(1);
      expect(setRewardSpy).toHaveBeenCalledWith(-1, true);
    });

    it('should reject learners it does not monitor', () => {
      const counter = new PerformanceCounter([buildLearner()]);

      expect(() => counter.setReward(buildLearner(), 1, true)).toThrow(ValidationError);
    });

    it('should leave learning identical to an unmonitored learner', () => {
      // Arrange
      const monitored = buildLearner('same');
      const plain = buildLearner('same');
      const counter = new PerformanceCounter([monitored]);
      const percepts = ['s1', 's2', 's3', 'end'];
      const rewards = [0, 1, -1, 4];

      // Act
      for (let episode = 0; episode < 10; episode++) {
        monitored.resetEpisode();
        plain.resetEpisode();
        percepts.forEach((percept, i) => {
          const terminal = i === percepts.length - 1;
          expect(monitored.step(percept)).toBe(plain.step(percept));
          counter.setReward(monitored, rewards[i], terminal);
          plain.setReward(rewards[i], terminal);
        });
      }

      // Assert
      expect(snapshot(monitored)).toEqual(snapshot(plain));
      expect(monitored.trials).toBe(plain.trials);
      expect(counter.statistics()[0].accumulatedRewards).toHaveLength(10);
      expect(counter.statistics()[0].accumulatedRewards[9]).toBe(40);
    });
  });

  describe('construction', () => {
    it('should name learners by position by default', () => {
      const counter = new PerformanceCounter([buildLearner(), buildLearner()]);

      expect(counter.statistics().map(s => s.name)).toEqual(['Learner 0', 'Learner 1']);
    });

    it('should require one name per learner', () => {
      expect(() => new PerformanceCounter([buildLearner()], ['a', 'b'])).toThrow(ValidationError);
    });
  });

  describe('showStatistics', () => {
    it('should print a row per learner', () => {
      // Arrange
      const consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
      const td = buildLearner();
      const idle = buildLearner();
      const counter = new PerformanceCounter([td, idle], ['td', 'idle']);
      td.step('s1');
      counter.setReward(td, 5, true);

      // Act
      counter.showStatistics();

      // Assert
      const printed = consoleLogSpy.mock.calls.map(call => String(call[0])).join('\n');
      expect(printed).toContain('Learner Statistics');
      expect(printed).toContain(renderStatistics(counter.statistics()));
    });
  });
});

describe('renderStatistics', () => {
  it('should show the last value of each series', () => {
    // Act
    const output = renderStatistics([
      {
        name: 'td',
        trials: 2,
        accumulatedRewards: [3, 5],
        knownStates: [0, 1],
        temperatures: [1, Math.exp(-0.5)],
      },
    ]);

    // Assert
    expect(output).toContain('td');
    expect(output).toContain('5.000');
    expect(output).toContain('0.6065');
  });

  it('should show a dash for learners without trials', () => {
    const output = renderStatistics([
      { name: 'idle', trials: 0, accumulatedRewards: [], knownStates: [], temperatures: [] },
    ]);

    expect(output).toContain('idle');
    expect(output).toContain('-');
  });
});
