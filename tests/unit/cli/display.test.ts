import { createProgressBar, displayStatistics, displaySteps } from '../../../src/cli/display/trajectory';
import { getTrajectoryStatistics } from '../../../src/trajectory/statistics';
import { TrajectoryStep } from '../../../src/types';

describe('CLI trajectory display', () => {
  let logSpy: jest.SpyInstance;

  const steps: TrajectoryStep[] = [
    {
      state: 'This is hard',
      action: 'Provide support and easier content.',
      reward: 'frustrated',
      timestamp: new Date('2025-08-29T10:00:00.000Z'),
      metadata: { language_level: 'L1', emotion_trend: 'stable', needs_intervention: true },
    },
  ];

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('draws proportional progress bars', () => {
    expect(createProgressBar(0.5, 10)).toBe('█████░░░░░');
    expect(createProgressBar(0, 4)).toBe('░░░░');
    expect(createProgressBar(1.5, 4)).toBe('████');
  });

  it('prints three lines per step and marks interventions', () => {
    displaySteps(steps);

    expect(logSpy).toHaveBeenCalledTimes(3);
    expect(logSpy.mock.calls[0][0]).toContain('intervention');
    expect(logSpy.mock.calls[1][0]).toContain('This is hard');
    expect(logSpy.mock.calls[2][0]).toContain('Provide support and easier content.');
  });

  it('prints a row per emotion in the statistics', () => {
    const stats = getTrajectoryStatistics(steps);
    expect(stats).not.toBeNull();
    if (stats) {
      displayStatistics(stats);
    }

    const output = logSpy.mock.calls.map((call) => String(call[0])).join('\n');
    expect(output).toContain('Steps:');
    expect(output).toContain('frustrated');
    expect(output).toContain('excited');
  });
});
