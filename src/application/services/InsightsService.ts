import dayjs from 'dayjs';
import { Category } from '../../domain/entities/Category.js';
import { CategorizedTransaction } from '../../domain/entities/Transaction.js';
import { normalizeDescription } from '../../domain/services/DescriptionNormalizer.js';
import {
  CashFlowTotalsDTO,
  CategoryBreakdownDTO,
  MerchantSpendDTO,
  MonthlyTrendDTO,
  RecurringChargeDTO,
  SpendingVelocityDTO,
  StatementInsightsDTO,
} from '../dto/StatementInsightsDTO.js';

export interface InsightsOptions {
  topMerchantLimit: number;
  /** Largest deviation from the mean charge, as a fraction of it, for a recurring charge. */
  recurringAmountTolerance: number;
  recurringIntervalDays: { min: number; max: number };
}

const DEFAULT_OPTIONS: InsightsOptions = {
  topMerchantLimit: 10,
  recurringAmountTolerance: 0.1,
  recurringIntervalDays: { min: 25, max: 35 },
};

const round = (value: number, places = 2): number => {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
};

const sum = (values: readonly number[]): number => values.reduce((total, value) => total + value, 0);

/**
 * Groups charges from the same merchant whatever store or reference number the bank
 * appends: "TARGET T-9801" and "TARGET T-1102" share the key "target t".
 */
export const merchantKey = (description: string): string => {
  const normalized = normalizeDescription(description);
  const words = normalized.split(' ').filter((word) => !/\d/.test(word));
  return words.length > 0 ? words.join(' ') : normalized;
};

interface MerchantGroup {
  merchant: string;
  charges: CategorizedTransaction[];
}

/** Spending summaries over a categorized ledger. Outflows are reported as positive amounts. */
export class InsightsService {
  private readonly options: InsightsOptions;

  constructor(options: Partial<InsightsOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  summarize(transactions: readonly CategorizedTransaction[]): StatementInsightsDTO {
    const merchants = this.groupOutflowsByMerchant(transactions);

    return {
      totals: this.totals(transactions),
      categoryBreakdown: this.categoryBreakdown(transactions),
      monthlyTrends: this.monthlyTrends(transactions),
      topMerchants: this.topMerchants(merchants),
      recurringCharges: this.recurringCharges(merchants),
      spendingVelocity: this.spendingVelocity(transactions),
    };
  }

  totals(transactions: readonly CategorizedTransaction[]): CashFlowTotalsDTO {
    const income = sum(transactions.filter((txn) => txn.amount > 0).map((txn) => txn.amount));
    const expenses = sum(transactions.filter((txn) => txn.amount < 0).map((txn) => Math.abs(txn.amount)));

    return { income: round(income), expenses: round(expenses), net: round(income - expenses) };
  }

  categoryBreakdown(transactions: readonly CategorizedTransaction[]): CategoryBreakdownDTO[] {
    const buckets = new Map<Category, { spent: number; income: number; transactionCount: number }>();

    transactions.forEach((txn) => {
      const bucket = buckets.get(txn.category) ?? { spent: 0, income: 0, transactionCount: 0 };

      if (txn.amount >= 0) {
        bucket.income += txn.amount;
      } else {
        bucket.spent += Math.abs(txn.amount);
      }
      bucket.transactionCount++;

      buckets.set(txn.category, bucket);
    });

    const totalSpent = sum(Array.from(buckets.values(), (bucket) => bucket.spent));

    return Array.from(buckets.entries())
      .map(([category, bucket]) => ({
        category,
        spent: round(bucket.spent),
        income: round(bucket.income),
        transactionCount: bucket.transactionCount,
        spendShare: totalSpent > 0 ? round((bucket.spent / totalSpent) * 100, 1) : 0,
      }))
      .sort((a, b) => b.spent - a.spent || a.category.localeCompare(b.category));
  }

  monthlyTrends(transactions: readonly CategorizedTransaction[]): MonthlyTrendDTO[] {
    const buckets = new Map<string, { income: number; expenses: number }>();

    transactions.forEach((txn) => {
      const month = dayjs(txn.date).format('YYYY-MM');
      const bucket = buckets.get(month) ?? { income: 0, expenses: 0 };

      if (txn.amount >= 0) {
        bucket.income += txn.amount;
      } else {
        bucket.expenses += Math.abs(txn.amount);
      }

      buckets.set(month, bucket);
    });

    return Array.from(buckets.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([month, totals]) => ({
        month,
        income: round(totals.income),
        expenses: round(totals.expenses),
        net: round(totals.income - totals.expenses),
      }));
  }

  spendingVelocity(transactions: readonly CategorizedTransaction[]): SpendingVelocityDTO {
    if (transactions.length === 0) {
      return { dailyAverage: 0, weeklyAverage: 0, monthlyAverage: 0 };
    }

    const dates = transactions.map((txn) => txn.date).sort();
    const days = dayjs(dates[dates.length - 1]).diff(dayjs(dates[0]), 'day') + 1;
    const daily = this.totals(transactions).expenses / days;

    return {
      dailyAverage: round(daily),
      weeklyAverage: round(daily * 7),
      monthlyAverage: round(daily * 30),
    };
  }

  private topMerchants(merchants: readonly MerchantGroup[]): MerchantSpendDTO[] {
    return merchants
      .map(({ merchant, charges }) => {
        const totalSpent = sum(charges.map((txn) => Math.abs(txn.amount)));
        return {
          merchant,
          totalSpent: round(totalSpent),
          transactionCount: charges.length,
          averageCharge: round(totalSpent / charges.length),
        };
      })
      .sort((a, b) => b.totalSpent - a.totalSpent || a.merchant.localeCompare(b.merchant))
      .slice(0, this.options.topMerchantLimit);
  }

  private recurringCharges(merchants: readonly MerchantGroup[]): RecurringChargeDTO[] {
    const { recurringAmountTolerance, recurringIntervalDays } = this.options;
    const recurring: RecurringChargeDTO[] = [];

    for (const { merchant, charges } of merchants) {
      if (charges.length < 2) continue;

      const amounts = charges.map((txn) => Math.abs(txn.amount));
      const mean = sum(amounts) / amounts.length;
      if (amounts.some((amount) => Math.abs(amount - mean) > mean * recurringAmountTolerance)) continue;

      const dates = charges.map((txn) => txn.date).sort();
      const intervals = dates.slice(1).map((date, index) => dayjs(date).diff(dayjs(dates[index]), 'day'));
      const averageInterval = sum(intervals) / intervals.length;
      if (averageInterval < recurringIntervalDays.min || averageInterval > recurringIntervalDays.max) continue;

      recurring.push({
        merchant,
        averageAmount: round(mean),
        frequency: 'monthly',
        lastCharged: dates[dates.length - 1],
        occurrences: charges.length,
      });
    }

    return recurring.sort((a, b) => b.averageAmount - a.averageAmount);
  }

  private groupOutflowsByMerchant(transactions: readonly CategorizedTransaction[]): MerchantGroup[] {
    const groups = new Map<string, MerchantGroup>();

    for (const txn of transactions) {
      if (txn.amount >= 0) continue;

      const key = merchantKey(txn.description);
      const group = groups.get(key);
      if (group) {
        group.charges.push(txn);
      } else {
        groups.set(key, { merchant: txn.description, charges: [txn] });
      }
    }

    return Array.from(groups.values());
  }
}
