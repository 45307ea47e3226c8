import { WorkspaceInput } from '../../utils/validation';
import { allFunds } from './funds';
import { sixtyFortyRuleSet } from './ruleSets';

/**
 * Workspace document as the API receives it.
 * p-1 is 60 in 2026 (born 1966) and retires at 65; p-bare has no glidepath settings.
 */
export const workspace: WorkspaceInput = {
  uploads: [
    {
      id: 'u-aug',
      userId: 'user-1',
      filename: 'positions-august.csv',
      uploadedAt: new Date('2026-08-01T00:00:00Z'),
      positions: [{ accountNumber: 'A', symbol: 'VTI', currentValue: '$1,000.00', quantity: '4' }],
    },
    {
      id: 'u-oct',
      userId: 'user-1',
      filename: 'positions-october.csv',
      uploadedAt: new Date('2026-10-08T00:00:00Z'),
      positions: [
        { accountNumber: 'A', symbol: 'VTI', currentValue: '$6,000.00', quantity: '24' },
        { accountNumber: 'A', symbol: 'BND', currentValue: '$4,000.00', quantity: '55' },
      ],
    },
  ],
  funds: allFunds,
  ruleSets: [sixtyFortyRuleSet],
  portfolios: [
    {
      id: 'p-1',
      userId: 'user-1',
      name: 'Retirement',
      ruleSetId: 'rs-60-40',
      yearBorn: 1966,
      retirementAge: 65,
      items: [
        { accountNumber: 'A', symbol: 'VTI' },
        { accountNumber: 'A', symbol: 'BND' },
      ],
    },
    {
      id: 'p-bare',
      userId: 'user-1',
      name: 'Unplanned',
      items: [{ accountNumber: 'A', symbol: 'VTI' }],
    },
  ],
};
