import express, { Express, NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { getTotals } from './api/reports/totals';
import { exportBreakdown, getCategoryBreakdown, getIncomeBreakdown, getPayeeBreakdown } from './api/reports/breakdown';
import { getNetWorth, getNetWorthSeries } from './api/reports/netWorth';
import { getVelocity } from './api/reports/velocity';
import { getInsights } from './api/reports/insights';
import { getBudget } from './api/reports/budget';
import { getOverview } from './api/reports/overview';
import { auditMonthlyTotals, rebuildMonthlyTotals } from './api/monthlyTotals/monthlyTotals';
import { importTransactions } from './api/transactions/import';
import { isTokenValid, login } from './api/auth/auth';
import { getErrorMessage, getStatusCode } from './utils/net/errors';

declare global {
  namespace Express {
    interface Request {
      userId?: number;
    }
  }
}

export const verifyToken = (req: Request, res: Response, next: NextFunction) => {
  const userId = isTokenValid(req.headers.authorization);
  if (!userId) {
    res.status(401).json({ message: 'Invalid token' });
    return;
  }
  req.userId = userId;
  next();
};

/**
 * Answers `{ error }` with the status the error maps to. Only failures that
 * are not plain errors are logged.
 */
export function sendError(res: Response, error: unknown) {
  const statusCode = getStatusCode(error);
  if (statusCode >= 500) {
    console.error(error);
  }
  res.status(statusCode).json({ error: getErrorMessage(error) });
}

/**
 * Wraps a handler so its result is sent as JSON and its failures through sendError
 */
export function handle<T>(handler: (req: Request) => T | Promise<T>) {
  return async (req: Request, res: Response) => {
    try {
      res.json(await handler(req));
    } catch (error) {
      sendError(res, error);
    }
  };
}

const app: Express = express();

// Middleware
app.use(express.json({ limit: '5mb' }));
app.use(bodyParser.urlencoded({ extended: true }));

// Report routes
app.get('/api/reports/totals', verifyToken, handle(getTotals));
app.get('/api/reports/breakdown/categories', verifyToken, handle(getCategoryBreakdown));
app.get('/api/reports/breakdown/payees', verifyToken, handle(getPayeeBreakdown));
app.get('/api/reports/breakdown/income', verifyToken, handle(getIncomeBreakdown));
app.get('/api/reports/breakdown/export', verifyToken, async (req: Request, res: Response) => {
  try {
    res.type('text/csv').send(await exportBreakdown(req));
  } catch (error) {
    sendError(res, error);
  }
});
app.get('/api/reports/netWorth', verifyToken, handle(getNetWorth));
app.get('/api/reports/netWorth/series', verifyToken, handle(getNetWorthSeries));
app.get('/api/reports/velocity', verifyToken, handle(getVelocity));
app.get('/api/reports/insights', verifyToken, handle(getInsights));
app.get('/api/reports/budget', verifyToken, handle(getBudget));
app.get('/api/reports/overview', verifyToken, handle(getOverview));

// Monthly totals index routes
app.post('/api/monthlyTotals/rebuild', verifyToken, handle(rebuildMonthlyTotals));
app.get('/api/monthlyTotals/audit', verifyToken, handle(auditMonthlyTotals));

// Transaction routes
app.post('/api/transactions/import', verifyToken, handle(importTransactions));

// Auth routes
app.post('/api/auth/token', handle(login));

app.post('/api/auth/logout', verifyToken, (_req: Request, res: Response) => {
  res.json({ token: null });
});

app.get('/api/auth/validate', (req: Request, res: Response) => {
  const userId = isTokenValid(req.headers.authorization);
  if (!userId) {
    res.status(401).json({ message: 'Invalid token' });
    return;
  }
  res.json({ token: userId });
});

export { app };
