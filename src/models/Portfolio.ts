/**
 * Portfolio data structures
 */

export interface PortfolioItem {
  accountNumber: string;
  symbol: string;
}

export interface Portfolio {
  id: string;
  userId: string;
  name: string;
  ruleSetId?: string;
  yearBorn?: number;
  retirementAge?: number;
  items: PortfolioItem[];
}

export interface RetirementStatus {
  currentAge: number;
  retirementAge: number;
  yearsToRetirement: number;
  status: string;
}

/**
 * Age-relative position against retirement, used to index glidepath bands.
 * Negative before retirement, positive after.
 */
export function getYearsToRetirement(
  yearBorn: number,
  retirementAge: number,
  currentYear: number
): number {
  return currentYear - yearBorn - retirementAge;
}

export function describeRetirementStatus(yearsToRetirement: number): string {
  if (yearsToRetirement < 0) {
    const years = -yearsToRetirement;
    return `${years} ${years === 1 ? "year" : "years"} until retirement`;
  }
  if (yearsToRetirement === 0) {
    return "Retirement this year!";
  }
  return `${yearsToRetirement} ${yearsToRetirement === 1 ? "year" : "years"} past retirement`;
}

export function getRetirementStatus(
  portfolio: Portfolio,
  currentYear: number
): RetirementStatus | null {
  if (portfolio.yearBorn === undefined || portfolio.retirementAge === undefined) {
    return null;
  }
  const yearsToRetirement = getYearsToRetirement(
    portfolio.yearBorn,
    portfolio.retirementAge,
    currentYear
  );
  return {
    currentAge: currentYear - portfolio.yearBorn,
    retirementAge: portfolio.retirementAge,
    yearsToRetirement,
    status: describeRetirementStatus(yearsToRetirement),
  };
}

/**
 * Distinct account numbers referenced by the portfolio, in item order
 */
export function getPortfolioAccounts(portfolio: Portfolio): string[] {
  return [...new Set(portfolio.items.map((item) => item.accountNumber))];
}
