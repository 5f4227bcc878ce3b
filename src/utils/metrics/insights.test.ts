import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import {
  Insight,
  InsightInput,
  InsightRowsInput,
  buildInsightRows,
  formatShortDateRange,
  generateInsights,
  previousComparisonRange,
} from './insights';
import { createMockLedger, makeTransaction } from '../test/mockData';
import { DateString, formatDate, parseDate } from '../date/date';
import { ZERO } from '../decimal/decimal';

const ledger = createMockLedger();

function input(overrides: Partial<InsightInput> = {}): InsightInput {
  return {
    transactions: [],
    history: [],
    window: { start: parseDate('2024-01-01'), end: parseDate('2024-01-31') },
    referenceDate: parseDate('2024-01-31'),
    categories: ledger.categories,
    income: ZERO,
    expenses: ZERO,
    savingsRate: null,
    ...overrides,
  };
}

function makeInsight(overrides: Partial<Insight> & Pick<Insight, 'id' | 'type'>): Insight {
  return {
    title: overrides.id,
    description: 'detail',
    why: null,
    severity: 'info',
    actionable: true,
    relatedCategoryId: null,
    relatedCategoryName: null,
    relatedPayee: null,
    ...overrides,
  };
}

function rowsInput(overrides: Partial<InsightRowsInput> = {}): InsightRowsInput {
  return {
    insights: [],
    uncategorizedCount: 0,
    uncategorizedAmount: ZERO,
    savingsRate: 0.3,
    income: new Decimal(1000),
    expenses: new Decimal(700),
    expenseCategoryIds: new Set(['cat-groceries', 'cat-gas']),
    overBudget: [],
    budgetAssigned: ZERO,
    ...overrides,
  };
}

describe('insights', () => {
  describe('previousComparisonRange', () => {
    it('should compare a whole month with the month before', () => {
      const range = previousComparisonRange({ start: parseDate('2024-01-01'), end: parseDate('2024-01-31') });

      expect([formatDate(range.start), formatDate(range.end), range.label]).toEqual([
        '2023-12-01',
        '2023-12-31',
        'last month',
      ]);
    });

    it('should compare a whole year with the year before', () => {
      const range = previousComparisonRange({ start: parseDate('2024-01-01'), end: parseDate('2024-12-31') });

      expect([formatDate(range.start), formatDate(range.end), range.label]).toEqual([
        '2023-01-01',
        '2023-12-31',
        'last year',
      ]);
    });

    it('should use the equally long range before any other window', () => {
      const range = previousComparisonRange({ start: parseDate('2024-01-10'), end: parseDate('2024-01-19') });

      expect([formatDate(range.start), formatDate(range.end), range.label]).toEqual([
        '2023-12-31',
        '2024-01-09',
        'previous period',
      ]);
    });

    it('should format ranges and single days', () => {
      expect(formatShortDateRange({ start: parseDate('2024-03-01'), end: parseDate('2024-03-31') })).toBe(
        'Mar 1 to Mar 31',
      );
      expect(formatShortDateRange({ start: parseDate('2024-01-09'), end: parseDate('2024-01-09') })).toBe('Jan 9');
    });
  });

  describe('generateInsights', () => {
    const quarter = { start: parseDate('2024-01-01'), end: parseDate('2024-03-31') };
    const subscription = [
      makeTransaction({ date: '2024-01-05', amount: '-15.99', payee: 'Netflix' }),
      makeTransaction({ date: '2024-02-05', amount: '-15.99', payee: 'Netflix' }),
    ];

    it('should find a monthly recurring expense', () => {
      const insights = generateInsights(
        input({
          window: quarter,
          referenceDate: parseDate('2024-03-31'),
          transactions: subscription,
          history: subscription,
        }),
      );

      expect(insights).toEqual([
        {
          id: 'recurring:netflix',
          type: 'recurringExpense',
          title: 'Netflix is recurring',
          description: 'About 15.99 monthly',
          why: 'Based on 2 payments ~ every 31 days.',
          severity: 'info',
          actionable: true,
          relatedCategoryId: null,
          relatedCategoryName: null,
          relatedPayee: 'Netflix',
        },
      ]);
    });

    it('should put alerts ahead of other insights', () => {
      const insights = generateInsights(
        input({
          window: quarter,
          referenceDate: parseDate('2024-03-31'),
          transactions: subscription,
          history: subscription,
          income: new Decimal(1000),
          expenses: new Decimal(1200),
          savingsRate: -0.2,
        }),
      );

      expect(insights.map((item) => item.id)).toEqual(['savings:over-income', 'recurring:netflix']);
      expect(insights[0].severity).toBe('alert');
      expect(insights[0].description).toBe('1200.00 expenses vs 1000.00 income');
    });

    describe('unusual spending', () => {
      const april = { start: parseDate('2024-04-01'), end: parseDate('2024-04-30') };
      const earlier = (['2024-01-15', '2024-02-15', '2024-03-15'] satisfies DateString[]).map((date) =>
        makeTransaction({ date, amount: '-100', payee: 'Fresh Mart', categoryId: 'cat-groceries' }),
      );

      it('should compare a category with its prior three month average', () => {
        const current = makeTransaction({
          date: '2024-04-10',
          amount: '-200',
          payee: 'Corner Grocer',
          categoryId: 'cat-groceries',
        });

        const insights = generateInsights(
          input({
            window: april,
            referenceDate: parseDate('2024-04-30'),
            transactions: [current],
            history: [...earlier, current],
          }),
        );

        expect(insights.map((item) => item.id)).toEqual(['unusual:category:cat-groceries', 'trend:spending']);
        expect(insights[0]).toMatchObject({
          title: 'Groceries spending is high',
          description: '200.00 vs 100.00 (up 100%)',
          why: 'Compared to your average from the prior 3 months.',
          severity: 'warning',
          relatedCategoryId: 'cat-groceries',
          relatedCategoryName: 'Groceries',
        });
        expect(insights[1]).toMatchObject({
          title: 'Spending is up 100%',
          description: '200.00 vs 100.00 last month',
          why: 'Compared to last month (Mar 1 to Mar 31).',
          severity: 'warning',
          actionable: true,
        });
      });

      it('should bucket spending without a category as Uncategorized', () => {
        const history = (['2024-01-15', '2024-02-15', '2024-03-15'] satisfies DateString[]).map((date) =>
          makeTransaction({ date, amount: '-30', payee: 'Market Stall' }),
        );
        const current = makeTransaction({ date: '2024-04-10', amount: '-60', payee: 'Flea Market' });

        const [unusual] = generateInsights(
          input({
            window: april,
            referenceDate: parseDate('2024-04-30'),
            transactions: [current],
            history: [...history, current],
          }),
        );

        expect(unusual).toMatchObject({
          id: 'unusual:Uncategorized',
          title: 'Uncategorized spending is high',
          relatedCategoryId: null,
          relatedCategoryName: 'Uncategorized',
        });
      });
    });

    describe('budget projection', () => {
      it('should warn when the current pace overruns a budget', () => {
        const insights = generateInsights(
          input({
            transactions: ledger.transactions,
            history: ledger.transactions,
            referenceDate: parseDate('2024-01-10'),
          }),
        );

        expect(insights).toHaveLength(1);
        expect(insights[0]).toMatchObject({
          id: 'budget:cat-groceries',
          type: 'budgetProjection',
          title: 'Groceries budget at risk',
          description: 'Projected 620.00 vs budget 300.00',
          why: 'Based on 10 days of spend so far.',
          severity: 'warning',
          relatedCategoryId: 'cat-groceries',
        });
      });

      it('should clamp a reference date before the window to its first day', () => {
        const [projection] = generateInsights(
          input({
            transactions: ledger.transactions,
            referenceDate: parseDate('2023-12-20'),
          }),
        );

        expect(projection.description).toBe('Projected 6200.00 vs budget 300.00');
        expect(projection.why).toBe('Based on 1 day of spend so far.');
      });

      it('should skip a window that has ended', () => {
        const insights = generateInsights(input({ transactions: ledger.transactions }));

        expect(insights.filter((item) => item.type === 'budgetProjection')).toEqual([]);
      });
    });

    describe('savings', () => {
      it('should suggest the amount needed to reach the savings target', () => {
        const [savings] = generateInsights(
          input({ income: new Decimal(1000), expenses: new Decimal(950), savingsRate: 0.05 }),
        );

        expect(savings).toMatchObject({
          id: 'savings:save-more',
          title: 'Try saving a bit more',
          description: 'Save 50.00 more to reach 10%',
          severity: 'info',
        });
      });

      it('should point out many small purchases once savings are healthy', () => {
        const coffees = Array.from({ length: 15 }, () =>
          makeTransaction({ date: '2024-01-05', amount: '-2', payee: 'Cafe' }),
        );

        const insights = generateInsights(
          input({
            transactions: coffees,
            income: new Decimal(1000),
            expenses: new Decimal(30),
            savingsRate: 0.97,
          }),
        );

        expect(insights).toHaveLength(1);
        expect(insights[0]).toMatchObject({
          id: 'small-purchases',
          type: 'smallPurchases',
          title: 'Lots of small purchases',
          description: '15 items under 20 add up to 30.00',
        });
      });

      it('should ignore too few small purchases', () => {
        const coffees = Array.from({ length: 14 }, () =>
          makeTransaction({ date: '2024-01-05', amount: '-2', payee: 'Cafe' }),
        );

        expect(generateInsights(input({ transactions: coffees }))).toEqual([]);
      });
    });

    it('should predict a bill due within a week', () => {
      const bills = [
        makeTransaction({ date: '2024-01-03', amount: '-90', payee: 'Hydro' }),
        makeTransaction({ date: '2024-02-03', amount: '-90', payee: 'Hydro' }),
        makeTransaction({ date: '2024-03-03', amount: '-80', payee: 'Hydro' }),
      ];

      const insights = generateInsights(
        input({
          window: { start: parseDate('2024-03-01'), end: parseDate('2024-03-31') },
          referenceDate: parseDate('2024-03-28'),
          transactions: [bills[2]],
          history: bills,
        }),
      );

      expect(insights).toEqual([
        {
          id: 'upcoming:hydro',
          type: 'upcomingBill',
          title: 'Hydro coming soon',
          description: 'Usually 86.67 in 5 days',
          why: null,
          severity: 'info',
          actionable: false,
          relatedCategoryId: null,
          relatedCategoryName: null,
          relatedPayee: 'Hydro',
        },
      ]);
    });

    it('should report lower spending as information', () => {
      const january = makeTransaction({ date: '2024-01-10', amount: '-200', categoryId: 'cat-groceries' });
      const february = makeTransaction({ date: '2024-02-10', amount: '-50', categoryId: 'cat-groceries' });

      const insights = generateInsights(
        input({
          window: { start: parseDate('2024-02-01'), end: parseDate('2024-02-29') },
          referenceDate: parseDate('2024-02-29'),
          transactions: [february],
          history: [january, february],
        }),
      );

      expect(insights).toHaveLength(1);
      expect(insights[0]).toMatchObject({
        id: 'trend:spending',
        title: 'Spending is down 75%',
        severity: 'info',
        actionable: false,
      });
    });

    describe('income variation', () => {
      const february = { start: parseDate('2024-02-01'), end: parseDate('2024-02-29') };
      const january = makeTransaction({
        date: '2024-01-01',
        amount: '1000',
        payee: 'ACME PAYROLL',
        categoryId: 'cat-salary',
      });

      it('should warn when income drops', () => {
        const current = makeTransaction({
          date: '2024-02-01',
          amount: '800',
          payee: 'ACME PAYROLL',
          categoryId: 'cat-salary',
        });

        const insights = generateInsights(
          input({
            window: february,
            referenceDate: parseDate('2024-02-29'),
            transactions: [current],
            history: [january, current],
          }),
        );

        expect(insights).toEqual([
          {
            id: 'trend:income',
            type: 'incomeVariation',
            title: 'Income is down 20%',
            description: '800.00 vs 1000.00 last month',
            why: 'Compared to last month (Jan 1 to Jan 31).',
            severity: 'warning',
            actionable: true,
            relatedCategoryId: null,
            relatedCategoryName: null,
            relatedPayee: null,
          },
        ]);
      });

      it('should note rising income without an action', () => {
        const current = makeTransaction({
          date: '2024-02-01',
          amount: '1200',
          payee: 'ACME PAYROLL',
          categoryId: 'cat-salary',
        });

        const [income] = generateInsights(
          input({
            window: february,
            referenceDate: parseDate('2024-02-29'),
            transactions: [current],
            history: [january, current],
          }),
        );

        expect(income).toMatchObject({ title: 'Income is up 20%', severity: 'info', actionable: false });
      });

      it('should ignore inflows that are not income', () => {
        const refund = makeTransaction({ date: '2024-02-01', amount: '800', payee: 'Refund' });

        expect(
          generateInsights(
            input({
              window: february,
              referenceDate: parseDate('2024-02-29'),
              transactions: [refund],
              history: [january, refund],
            }),
          ),
        ).toEqual([]);
      });
    });
  });

  describe('buildInsightRows', () => {
    const unusualUncategorized = makeInsight({
      id: 'unusual:Uncategorized',
      type: 'unusualSpending',
      severity: 'warning',
      relatedCategoryName: 'Uncategorized',
    });
    const projection = makeInsight({
      id: 'budget:cat-groceries',
      type: 'budgetProjection',
      severity: 'warning',
      relatedCategoryId: 'cat-groceries',
      relatedCategoryName: 'Groceries',
    });
    const recurring = makeInsight({ id: 'recurring:netflix', type: 'recurringExpense', relatedPayee: 'Netflix' });
    const upcoming = makeInsight({
      id: 'upcoming:hydro',
      type: 'upcomingBill',
      actionable: false,
      relatedPayee: 'Hydro',
    });
    const trend = makeInsight({ id: 'trend:spending', type: 'spendingTrend', actionable: false });

    it('should lead with uncategorized spending and keep three engine rows', () => {
      const rows = buildInsightRows(
        rowsInput({
          insights: [unusualUncategorized, projection, recurring, upcoming, trend],
          uncategorizedCount: 2,
          uncategorizedAmount: new Decimal(45),
        }),
      );

      expect(rows.map((row) => [row.id, row.actionTitle])).toEqual([
        ['uncategorized', 'Fix'],
        ['budget:cat-groceries', 'Fix'],
        ['recurring:netflix', 'Fix'],
        ['upcoming:hydro', 'Review'],
      ]);
      expect(rows[0]).toMatchObject({
        title: 'Categorize uncategorized spending',
        detail: '2 transactions totaling 45.00',
        severity: 'warning',
        action: { type: 'openUncategorized' },
      });
      expect(rows[1].action).toEqual({ type: 'fixBudgetCategory', categoryId: 'cat-groceries' });
      expect(rows[3].action).toEqual({ type: 'reviewPayee', payee: 'Hydro' });
    });

    it('should keep four engine rows without uncategorized spending', () => {
      const rows = buildInsightRows(rowsInput({ insights: [unusualUncategorized, projection, recurring, upcoming, trend] }));

      expect(rows.map((row) => row.id)).toEqual([
        'unusual:Uncategorized',
        'budget:cat-groceries',
        'recurring:netflix',
        'upcoming:hydro',
      ]);
      expect(rows[0].action).toBeNull();
      expect(rows[0].actionTitle).toBeNull();
    });

    it('should map the remaining insight types to actions', () => {
      const rows = buildInsightRows(
        rowsInput({
          insights: [
            makeInsight({
              id: 'unusual:category:cat-gas',
              type: 'unusualSpending',
              relatedCategoryId: 'cat-gas',
              relatedCategoryName: 'Gas',
            }),
            makeInsight({ id: 'trend:spending', type: 'spendingTrend' }),
            makeInsight({ id: 'small-purchases', type: 'smallPurchases' }),
            makeInsight({ id: 'trend:income', type: 'incomeVariation' }),
          ],
        }),
      );

      expect(rows.map((row) => [row.action, row.actionTitle])).toEqual([
        [{ type: 'showCategoryTransactions', categoryId: 'cat-gas' }, 'Fix'],
        [{ type: 'showIncomeExpenseDetail', detail: 'expenses' }, 'Review'],
        [{ type: 'showSmallPurchases', limit: 20 }, 'Review'],
        [{ type: 'showIncomeExpenseDetail', detail: 'income' }, 'Review'],
      ]);
    });

    it('should not offer to fix a budget outside the expense categories', () => {
      const [row] = buildInsightRows(
        rowsInput({ insights: [makeInsight({ id: 'budget:cat-salary', type: 'budgetProjection', relatedCategoryId: 'cat-salary' })] }),
      );

      expect(row.action).toBeNull();
    });

    describe('fallbacks', () => {
      it('should ask for income data and flag the worst budget', () => {
        const rows = buildInsightRows(
          rowsInput({
            savingsRate: null,
            overBudget: [{ categoryId: 'cat-gas', name: 'Gas', overBy: new Decimal(50) }],
            budgetAssigned: new Decimal(300),
          }),
        );

        expect(rows).toEqual([
          {
            id: 'no_income',
            title: 'No income detected',
            detail: 'Import or add income to unlock more insights.',
            why: null,
            severity: 'info',
            action: { type: 'importData' },
            actionTitle: 'Import',
          },
          {
            id: 'over_budget_top',
            title: 'Gas is over budget',
            detail: 'Over by 50.00.',
            why: 'Based on spending in this period.',
            severity: 'warning',
            action: { type: 'fixBudgetCategory', categoryId: 'cat-gas' },
            actionTitle: 'Fix',
          },
        ]);
      });

      it('should alert on spending over income', () => {
        const rows = buildInsightRows(
          rowsInput({
            savingsRate: -0.1,
            expenses: new Decimal(1100),
            budgetAssigned: new Decimal(300),
          }),
        );

        expect(rows.map((row) => [row.id, row.severity, row.actionTitle])).toEqual([
          ['over_income', 'alert', 'Review'],
          ['budget_on_track', 'info', null],
        ]);
        expect(rows[0].detail).toBe('1100.00 expenses vs 1000.00 income');
        expect(rows[0].action).toEqual({ type: 'openReview', section: 'expenses' });
      });

      it('should pick the savings row by rate', () => {
        expect(buildInsightRows(rowsInput({ savingsRate: 0.05 })).map((row) => row.id)).toEqual(['save_more']);
        expect(buildInsightRows(rowsInput({ savingsRate: 0.3 })).map((row) => row.id)).toEqual(['savings_strong']);
      });
    });
  });
});

describe('insight determinism', () => {
  const quarter = { start: parseDate('2024-01-01'), end: parseDate('2024-03-31') };
  const transactions = [
    makeTransaction({ date: '2024-01-05', amount: '-15.99', payee: 'Netflix' }),
    makeTransaction({ date: '2024-01-06', amount: '-15.99', payee: 'Spotify' }),
    makeTransaction({ date: '2024-02-05', amount: '-15.99', payee: 'Netflix' }),
    makeTransaction({ date: '2024-02-06', amount: '-15.99', payee: 'Spotify' }),
    makeTransaction({ date: '2024-02-10', amount: '-80', payee: 'Fresh Mart', categoryId: 'cat-groceries' }),
  ];
  const engineInput = () =>
    input({
      window: quarter,
      referenceDate: parseDate('2024-03-31'),
      transactions,
      history: transactions,
      income: new Decimal(100),
      expenses: new Decimal(143.96),
      savingsRate: -0.4396,
    });

  it('should return identical insights and rows for identical input', () => {
    const first = generateInsights(engineInput());
    const second = generateInsights(engineInput());

    expect(second).toEqual(first);
    expect(buildInsightRows(rowsInput({ insights: second }))).toEqual(buildInsightRows(rowsInput({ insights: first })));
  });

  it('should not depend on the order transactions arrive in', () => {
    const reversed = [...transactions].reverse();

    const forwards = generateInsights(engineInput());
    const backwards = generateInsights({ ...engineInput(), transactions: reversed, history: reversed });

    expect(backwards.map((item) => item.id)).toEqual(forwards.map((item) => item.id));
    expect(forwards.map((item) => item.id)).toEqual(['savings:over-income', 'recurring:netflix']);
  });

  it('should leave its input untouched', () => {
    const before = transactions.map((transaction) => transaction.serialize());

    generateInsights(engineInput());

    expect(transactions.map((transaction) => transaction.serialize())).toEqual(before);
  });
});
