import { Category } from '../../domain/entities/Category.js';

export interface CashFlowTotalsDTO {
  income: number;
  expenses: number;
  net: number;
}

export interface CategoryBreakdownDTO {
  category: Category;
  spent: number;
  income: number;
  transactionCount: number;
  /** Percentage of all spending, one decimal. */
  spendShare: number;
}

export interface MonthlyTrendDTO extends CashFlowTotalsDTO {
  month: string; // YYYY-MM
}

export interface MerchantSpendDTO {
  merchant: string;
  totalSpent: number;
  transactionCount: number;
  averageCharge: number;
}

export interface RecurringChargeDTO {
  merchant: string;
  averageAmount: number;
  frequency: 'monthly';
  lastCharged: string;
  occurrences: number;
}

export interface SpendingVelocityDTO {
  dailyAverage: number;
  weeklyAverage: number;
  monthlyAverage: number;
}

export interface StatementInsightsDTO {
  totals: CashFlowTotalsDTO;
  categoryBreakdown: CategoryBreakdownDTO[];
  monthlyTrends: MonthlyTrendDTO[];
  topMerchants: MerchantSpendDTO[];
  recurringCharges: RecurringChargeDTO[];
  spendingVelocity: SpendingVelocityDTO;
}
