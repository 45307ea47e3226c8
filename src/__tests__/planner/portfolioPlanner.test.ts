import { PortfolioPlanner } from '../../planner/portfolioPlanner';
import { loadWorkspace } from '../../store/inMemoryStore';
import { loadConfig } from '../../utils/config';
import { NotFoundError, SimulationCancelledError, ValidationError } from '../../utils/errors';
import { workspace } from '../fixtures/workspace';

const flatConfig = {
  ...loadConfig({}),
  assetClassAssumptions: {
    Stocks: { meanReturn: 0.05, stdDev: 0 },
    Bonds: { meanReturn: 0.05, stdDev: 0 },
  },
};

function createPlanner(): PortfolioPlanner {
  return new PortfolioPlanner({
    store: loadWorkspace(workspace),
    config: flatConfig,
    now: () => new Date('2026-10-18T12:00:00Z'),
  });
}

const params = {
  contribution: 0,
  withdrawalMode: 'percent',
  withdrawalAmount: 4,
  inflationRate: 0,
  trials: 3,
  endAge: 62,
};

describe('PortfolioPlanner', () => {
  describe('analyzePortfolio', () => {
    it('should value the latest upload of each account', () => {
      const analysis = createPlanner().analyzePortfolio('p-1');

      expect(analysis.totalValue).toBe(10000);
      expect(analysis.hasTarget).toBe(true);
      expect(analysis.retirement).toEqual({
        currentAge: 60,
        retirementAge: 65,
        yearsToRetirement: -5,
        status: '5 years until retirement',
      });
    });

    it('should analyze without targets when the portfolio has no glidepath', () => {
      const analysis = createPlanner().analyzePortfolio('p-bare');

      expect(analysis.totalValue).toBe(6000);
      expect(analysis.hasTarget).toBe(false);
      expect(analysis.retirement).toBeNull();
    });

    it('should throw NotFoundError for an unknown portfolio', () => {
      expect(() => createPlanner().analyzePortfolio('missing')).toThrow(NotFoundError);
      expect(() => createPlanner().analyzePortfolio('missing')).toThrow("Portfolio 'missing' not found");
    });
  });

  describe('planRebalance', () => {
    it('should report a portfolio already on target', () => {
      const plan = createPlanner().planRebalance('p-1');

      expect(plan.actions).toEqual([]);
      expect(plan.tolerancePct).toBe(2);
      expect(plan.message).toBe('All categories are within ±2% of target.');
    });

    it('should reject a tolerance outside 0-100', () => {
      expect(() => createPlanner().planRebalance('p-1', -1)).toThrow(ValidationError);
    });
  });

  describe('runProjection', () => {
    it('should project from the current portfolio value', () => {
      const result = createPlanner().runProjection('p-1', params);

      expect(result.startingBalance).toBe(10000);
      expect(result.currentAge).toBe(60);
      expect(result.retirementAge).toBe(65);
      expect(result.trials).toBe(3);
      expect(result.median.map((point) => point.age)).toEqual([60, 61, 62]);
      expect(result.median[1].balance).toBeCloseTo(10500, 6);
      expect(result.median[2].balance).toBeCloseTo(11025, 6);
      expect(result.medianAtRetirement).toBeCloseTo(11025, 6);
      expect(result.withdrawalAtRetirement).toBe(0);
      expect(result.totalContributions).toBe(0);
      expect(result.probabilityOfSuccess).toBe(100);
    });

    it('should report the freshest upload date', () => {
      const result = createPlanner().runProjection('p-1', params);

      expect(result.uploadDate).toBe('2026-10-08T00:00:00.000Z');
      expect(result.daysSinceUpload).toBe(10);
    });

    it('should reject a portfolio without glidepath settings', () => {
      expect(() => createPlanner().runProjection('p-bare', params)).toThrow(
        'Projection needs a glidepath rule set, birth year and retirement age on the portfolio'
      );
    });

    it('should reject an end age at or before the current age', () => {
      expect(() => createPlanner().runProjection('p-1', { ...params, endAge: 60 })).toThrow(
        'End age must be greater than current age (60)'
      );
    });

    it('should reject a percentage withdrawal over 100', () => {
      let caught: unknown;
      try {
        createPlanner().runProjection('p-1', { ...params, withdrawalAmount: 150 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({
        message: 'Invalid projection parameters',
        issues: [{ path: 'withdrawalAmount', message: 'Percentage withdrawal cannot exceed 100' }],
      });
    });

    it('should reject missing parameters before looking up the portfolio', () => {
      expect(() => createPlanner().runProjection('missing', {})).toThrow(ValidationError);
    });

    it('should stop when the signal is aborted', () => {
      const controller = new AbortController();
      controller.abort();
      expect(() => createPlanner().runProjection('p-1', params, { signal: controller.signal })).toThrow(
        SimulationCancelledError
      );
    });
  });
});
