import { ColumnDetection, ColumnRoles, Role } from '@/types/data';

interface RoleRule {
  triggers: string[];
  fallback: (columns: string[]) => string;
}

const positional = (index: number) => (columns: string[]): string =>
  columns.length > index ? columns[index] : columns[0];

/**
 * A role takes the first column (left to right) whose lower-cased name contains
 * one of its triggers, otherwise its fallback column. Callers pass at least one
 * column; the table loader rejects header-less files.
 */
export const ROLE_RULES: Readonly<Record<Role, RoleRule>> = {
  date: { triggers: ['date'], fallback: positional(0) },
  time: { triggers: ['time'], fallback: positional(1) },
  location: { triggers: ['location', 'store'], fallback: positional(2) },
  category: { triggers: ['category', 'product'], fallback: positional(3) },
  amount: { triggers: ['bill', 'total', 'amount', 'price'], fallback: columns => columns[columns.length - 1] },
};

export const ROLE_ORDER: readonly Role[] = ['date', 'time', 'location', 'category', 'amount'];

function candidatesFor(role: Role, columnNames: string[]): string[] {
  const { triggers } = ROLE_RULES[role];
  return columnNames.filter(name => {
    const lower = name.toLowerCase();
    return triggers.some(trigger => lower.includes(trigger));
  });
}

/**
 * Infers every role and keeps the full candidate lists for the column
 * detection report.
 */
export function detectColumns(columnNames: string[]): ColumnDetection {
  const candidates: Record<Role, string[]> = {
    date: candidatesFor('date', columnNames),
    time: candidatesFor('time', columnNames),
    location: candidatesFor('location', columnNames),
    category: candidatesFor('category', columnNames),
    amount: candidatesFor('amount', columnNames),
  };

  const pick = (role: Role): string =>
    candidates[role].length > 0 ? candidates[role][0] : ROLE_RULES[role].fallback(columnNames);

  const roles: ColumnRoles = {
    date: pick('date'),
    time: pick('time'),
    location: pick('location'),
    category: pick('category'),
    amount: pick('amount'),
  };

  return {
    roles,
    candidates,
    fallbacks: ROLE_ORDER.filter(role => candidates[role].length === 0),
  };
}

export function resolve(columnNames: string[]): ColumnRoles {
  return detectColumns(columnNames).roles;
}
