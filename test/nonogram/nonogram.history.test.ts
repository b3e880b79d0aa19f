import {
  createHistory,
  historyEntries,
  markExhausted,
  markWinner,
  recordGeneration,
} from '../../src/nonogram/nonogram.history';
import {
  exportHistoryCSV,
  exportHistoryJSONL,
  exportSweepCSV,
} from '../../src/nonogram/nonogram.telemetry.exports';
import type { Population, SweepResult } from '../../src/nonogram/nonogram.types';

function scored(scores: number[]): Population {
  return scores.map((score, index) => ({ solution: { grid: [[index]] }, score }));
}

describe('Run history', () => {
  it('records best, median and worst and counts the generation', () => {
    // Arrange
    const history = createHistory({ grid: [[0]] });
    // Act
    const entry = recordGeneration(history, scored([4, 5, 6, 9]));
    // Assert
    expect(entry).toEqual({ generation: 0, best: 4, median: 5.5, worst: 9 });
    expect(history.iterations).toBe(1);
    expect(history.best).toEqual([4]);
    expect(history.median).toEqual([5.5]);
    expect(history.worst).toEqual([9]);
  });

  it('starts exhausted with the placeholder solution', () => {
    const placeholder = { grid: [[1]] };
    const history = createHistory(placeholder);
    expect(history.winner).toEqual({ ok: false, solution: { grid: [[1]] } });
    placeholder.grid[0][0] = 2;
    expect(history.winner.solution.grid).toEqual([[1]]);
  });

  it('marks a winner only for a zero best score and stores a copy', () => {
    // Arrange
    const history = createHistory({ grid: [[0]] });
    const unsolved = scored([2, 3]);
    const solved = scored([0, 3]);
    // Act
    const first = markWinner(history, unsolved);
    const second = markWinner(history, solved);
    solved[0].solution.grid[0][0] = 7;
    // Assert
    expect(first).toBe(false);
    expect(second).toBe(true);
    expect(history.winner).toEqual({ ok: true, solution: { grid: [[0]] } });
  });

  it('marks exhaustion with the best entry unless already won', () => {
    const history = createHistory({ grid: [[9]] });
    markExhausted(history, scored([2, 3]));
    expect(history.winner).toEqual({ ok: false, solution: { grid: [[0]] } });

    const won = createHistory({ grid: [[9]] });
    markWinner(won, scored([0]));
    markExhausted(won, scored([4]));
    expect(won.winner.ok).toBe(true);
  });

  it('lists recorded generations as entries', () => {
    const history = createHistory({ grid: [[0]] });
    recordGeneration(history, scored([4, 5, 6, 9]));
    recordGeneration(history, scored([0, 1, 3, 6]));
    expect(historyEntries(history)).toEqual([
      { generation: 0, best: 4, median: 5.5, worst: 9 },
      { generation: 1, best: 0, median: 2, worst: 6 },
    ]);
  });
});

describe('Telemetry exports', () => {
  const history = createHistory({ grid: [[0]] });
  recordGeneration(history, scored([4, 5, 6, 9]));
  recordGeneration(history, scored([0, 1, 3, 6]));

  it('writes one CSV row per generation under a fixed header', () => {
    expect(exportHistoryCSV(history)).toBe(
      'generation,best,median,worst\n0,4,5.5,9\n1,0,2,6'
    );
  });

  it('writes one JSON object per line', () => {
    expect(exportHistoryJSONL(history)).toBe(
      '{"generation":0,"best":4,"median":5.5,"worst":9}\n{"generation":1,"best":0,"median":2,"worst":6}'
    );
  });

  it('handles a history with no generations', () => {
    const empty = createHistory({ grid: [[0]] });
    expect(exportHistoryCSV(empty)).toBe('generation,best,median,worst');
    expect(exportHistoryJSONL(empty)).toBe('');
  });

  it('writes sweep trials in run order', () => {
    // Arrange
    const result: SweepResult = {
      bestScore: 0,
      parameters: undefined,
      trials: [
        {
          parameters: {
            crossProbability: 0.3,
            mutationProbability: 0.1,
            slideTries: 3,
            seed: 11,
            populationSize: 20,
            tournamentSize: 3,
            maxIterations: 10,
          },
          finalBest: 4,
          iterations: 10,
          solved: false,
        },
        {
          parameters: {
            crossProbability: 0.6,
            mutationProbability: 0.2,
            slideTries: 5,
            seed: 13,
            populationSize: 20,
            tournamentSize: 3,
            maxIterations: 10,
          },
          finalBest: 0,
          iterations: 6,
          solved: true,
        },
      ],
    };
    // Act
    const csv = exportSweepCSV(result);
    // Assert
    expect(csv.split('\n')).toEqual([
      'crossProbability,mutationProbability,slideTries,seed,populationSize,tournamentSize,maxIterations,finalBest,iterations,solved',
      '0.3,0.1,3,11,20,3,10,4,10,false',
      '0.6,0.2,5,13,20,3,10,0,6,true',
    ]);
  });
});
