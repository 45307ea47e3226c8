import { analyzeAllocation } from '../../engine/portfolio';
import { allocateSellAcrossAccounts, planRebalance } from '../../engine/rebalancer';
import { AllocationBreakdown } from '../../models/AllocationBreakdown';
import { CategoryKey, OTHER_KEY, UNKNOWN_KEY, categoryKey, categoryKeyId } from '../../models/AssetClass';
import { Fund } from '../../models/Fund';
import { GlidepathRule } from '../../models/Glidepath';
import { Portfolio } from '../../models/Portfolio';
import { allFunds, findFixtureFund } from '../fixtures/funds';
import { makePortfolio, makeUpload, uploadsFor } from '../fixtures/positions';
import { singleBand, sixtyForty } from '../fixtures/ruleSets';

function fundsIn(key: CategoryKey): Fund[] {
  return allFunds.filter(
    (fund) =>
      fund.category !== undefined &&
      categoryKeyId(categoryKey(fund.category.assetClass, fund.category.name)) === categoryKeyId(key)
  );
}

function breakdownFor(
  rows: Array<[accountNumber: string, symbol: string, currentValue: string]>,
  band: GlidepathRule | null,
  portfolio: Portfolio = makePortfolio(rows.map(([accountNumber, symbol]) => [accountNumber, symbol]))
): AllocationBreakdown {
  return analyzeAllocation({
    portfolio,
    uploadsByAccount: uploadsFor(makeUpload('u1', rows)),
    findFund: findFixtureFund,
    band,
    retirement: null,
  });
}

const threeWay = singleBand([
  { assetClass: 'Stocks', category: 'Large Cap', percentage: 50 },
  { assetClass: 'Stocks', category: 'International', percentage: 20 },
  { assetClass: 'Bonds', category: 'Treasury', percentage: 30 },
]);

describe('allocateSellAcrossAccounts', () => {
  it('should empty the largest account before touching the next', () => {
    expect(
      allocateSellAcrossAccounts(650, [
        { accountNumber: 'A', balance: 500 },
        { accountNumber: 'B', balance: 300 },
        { accountNumber: 'C', balance: 100 },
      ])
    ).toEqual([
      { accountNumber: 'A', amount: 500 },
      { accountNumber: 'B', amount: 150 },
      { accountNumber: 'C', amount: 0 },
    ]);
  });

  it('should break balance ties by account number', () => {
    expect(
      allocateSellAcrossAccounts(100, [
        { accountNumber: 'B', balance: 300 },
        { accountNumber: 'A', balance: 300 },
      ])
    ).toEqual([
      { accountNumber: 'A', amount: 100 },
      { accountNumber: 'B', amount: 0 },
    ]);
  });

  it('should never sell more than an account holds', () => {
    expect(
      allocateSellAcrossAccounts(1000, [
        { accountNumber: 'A', balance: 500 },
        { accountNumber: 'B', balance: 300 },
      ])
    ).toEqual([
      { accountNumber: 'A', amount: 500 },
      { accountNumber: 'B', amount: 300 },
    ]);
  });
});

describe('planRebalance', () => {
  it('should explain when there is no glidepath target', () => {
    const plan = planRebalance(breakdownFor([['A', 'VTI', '1000']], null), 2, fundsIn);
    expect(plan).toEqual({
      actions: [],
      totalBuys: 0,
      totalSells: 0,
      netBalanced: true,
      tolerancePct: 2,
      message:
        'No glidepath target for this portfolio. Assign a rule set, birth year and retirement age to get rebalancing recommendations.',
    });
  });

  it('should explain when the portfolio has no value', () => {
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '$0.00'],
          ['A', 'BND', '0'],
        ],
        sixtyForty
      ),
      2,
      fundsIn
    );
    expect(plan.actions).toEqual([]);
    expect(plan.message).toBe('Portfolio has no value to rebalance.');
  });

  it('should do nothing when every category is within tolerance', () => {
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '6010'],
          ['A', 'BND', '3990'],
        ],
        sixtyForty
      ),
      2,
      fundsIn
    );
    expect(plan.actions).toEqual([]);
    expect(plan.netBalanced).toBe(true);
    expect(plan.message).toBe('All categories are within ±2% of target.');
  });

  it('should sell the overweight category and buy the missing one from the same account', () => {
    // B's selection has no upload, so only A's $10,000 of Large Cap counts
    const portfolio = makePortfolio([
      ['A', 'VTI'],
      ['B', 'VOO'],
    ]);
    const breakdown = breakdownFor([['A', 'VTI', '$10,000.00']], sixtyForty, portfolio);

    expect(planRebalance(breakdown, 2, fundsIn)).toEqual({
      actions: [
        {
          action: 'Sell',
          amount: 4000,
          key: categoryKey('Stocks', 'Large Cap'),
          label: 'Stocks:Large Cap',
          assetClass: 'Stocks',
          category: 'Large Cap',
          tagged: true,
          pctDiff: -40,
          accounts: [{ accountNumber: 'A', amount: 4000 }],
          funds: [{ ticker: 'VTI', preference: 1, value: 10000 }],
        },
        {
          action: 'Buy',
          amount: 4000,
          key: categoryKey('Bonds', 'Treasury'),
          label: 'Bonds:Treasury',
          assetClass: 'Bonds',
          category: 'Treasury',
          tagged: true,
          pctDiff: 40,
          accounts: [{ accountNumber: 'A', amount: 4000 }],
          funds: [{ ticker: 'BND', preference: 1 }],
        },
      ],
      totalBuys: 4000,
      totalSells: 4000,
      netBalanced: true,
      tolerancePct: 2,
    });
  });

  it('should sell from the largest account first and fund buys from the smallest cash first', () => {
    const band = singleBand([
      { assetClass: 'Stocks', category: 'Large Cap', percentage: 25 },
      { assetClass: 'Bonds', category: 'Treasury', percentage: 75 },
    ]);
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '3000'],
          ['B', 'VOO', '5000'],
        ],
        band
      ),
      2,
      fundsIn
    );

    const [sell, buy] = plan.actions;
    expect(sell.accounts).toEqual([
      { accountNumber: 'B', amount: 5000 },
      { accountNumber: 'A', amount: 1000 },
    ]);
    expect(sell.funds).toEqual([
      { ticker: 'VOO', preference: 2, value: 5000 },
      { ticker: 'VTI', preference: 1, value: 3000 },
    ]);
    expect(buy.accounts).toEqual([
      { accountNumber: 'A', amount: 1000 },
      { accountNumber: 'B', amount: 5000 },
    ]);
    expect(plan.totalSells).toBe(6000);
    expect(plan.totalBuys).toBe(6000);
  });

  it('should sell untagged overweight categories to fund a tagged buy', () => {
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '5100'],
          ['A', 'VXUS', '2150'],
          ['A', 'BND', '2750'],
        ],
        threeWay
      ),
      2,
      fundsIn
    );

    expect(plan.actions.map((a) => [a.action, a.label, a.amount, a.tagged])).toEqual([
      ['Sell', 'Stocks:International', 150, false],
      ['Sell', 'Stocks:Large Cap', 100, false],
      ['Buy', 'Bonds:Treasury', 250, true],
    ]);
    expect(plan.netBalanced).toBe(true);
    expect(plan.message).toBeUndefined();
  });

  it('should spend leftover sale proceeds on untagged underweight categories', () => {
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '5500'],
          ['A', 'VXUS', '1900'],
          ['A', 'BND', '2600'],
        ],
        threeWay
      ),
      2,
      fundsIn
    );

    expect(plan.actions.map((a) => [a.action, a.label, a.amount, a.tagged])).toEqual([
      ['Sell', 'Stocks:Large Cap', 500, true],
      ['Buy', 'Bonds:Treasury', 400, true],
      ['Buy', 'Stocks:International', 100, false],
    ]);
    expect(plan.actions[2].funds).toEqual([{ ticker: 'VXUS', preference: 1 }]);
    expect(plan.totalBuys).toBe(500);
    expect(plan.totalSells).toBe(500);
  });

  it('should sell Other alongside other out-of-tolerance categories', () => {
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '9000'],
          ['A', 'FCASH', '1000'],
        ],
        sixtyForty
      ),
      2,
      fundsIn
    );

    expect(plan.actions.map((a) => [a.action, a.label, a.amount])).toEqual([
      ['Sell', 'Stocks:Large Cap', 3000],
      ['Sell', 'Other', 1000],
      ['Buy', 'Bonds:Treasury', 4000],
    ]);
    expect(plan.actions[1].key).toEqual(OTHER_KEY);
    expect(plan.actions[1].funds).toEqual([{ ticker: 'FCASH', value: 1000 }]);
    expect(plan.netBalanced).toBe(true);
  });

  it('should leave a dollar or less of Other alone', () => {
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '5000'],
          ['A', 'FCASH', '0.50'],
          ['A', 'BND', '5000'],
        ],
        sixtyForty
      ),
      2,
      fundsIn
    );

    expect(plan.actions.map((a) => [a.action, a.label])).toEqual([
      ['Sell', 'Bonds:Treasury'],
      ['Buy', 'Stocks:Large Cap'],
    ]);
    expect(plan.totalSells).toBeCloseTo(999.8, 2);
    expect(plan.totalBuys).toBe(plan.totalSells);
    expect(plan.netBalanced).toBe(true);
  });

  it('should sell holdings with no fund record when they breach tolerance', () => {
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '6000'],
          ['A', 'XYZ', '1000'],
          ['A', 'BND', '3000'],
        ],
        sixtyForty
      ),
      2,
      fundsIn
    );

    expect(plan.actions.map((a) => [a.action, a.label, a.amount])).toEqual([
      ['Sell', 'Unknown', 1000],
      ['Buy', 'Bonds:Treasury', 1000],
    ]);
    expect(plan.actions[0].key).toEqual(UNKNOWN_KEY);
    expect(plan.actions[0].funds).toEqual([{ ticker: 'XYZ', value: 1000 }]);
  });

  it('should respect a wider tolerance band', () => {
    const plan = planRebalance(
      breakdownFor(
        [
          ['A', 'VTI', '6500'],
          ['A', 'BND', '3500'],
        ],
        sixtyForty
      ),
      10,
      fundsIn
    );
    expect(plan.actions).toEqual([]);
    expect(plan.tolerancePct).toBe(10);
    expect(plan.message).toBe('All categories are within ±10% of target.');
  });
});
