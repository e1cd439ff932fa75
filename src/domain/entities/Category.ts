export const CATEGORIES = [
  'Income',
  'Housing',
  'Groceries',
  'Dining',
  'Transportation',
  'Utilities',
  'Subscriptions',
  'Entertainment',
  'Healthcare',
  'Shopping',
  'Other',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const OTHER_CATEGORY: Category = 'Other';

export const resolveCategory = (name: string): Category | null => {
  const normalized = name.trim().toLowerCase();
  return CATEGORIES.find((category) => category.toLowerCase() === normalized) ?? null;
};
