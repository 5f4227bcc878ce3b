import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Request, Response } from 'express';
import { handle, sendError, verifyToken } from './app';
import { isTokenValid } from './api/auth/auth';
import { ApiError } from './utils/net/errors';

vi.mock('./api/auth/auth');
vi.mock('./api/reports/totals');
vi.mock('./api/reports/breakdown');
vi.mock('./api/reports/netWorth');
vi.mock('./api/reports/velocity');
vi.mock('./api/reports/insights');
vi.mock('./api/reports/budget');
vi.mock('./api/reports/overview');
vi.mock('./api/monthlyTotals/monthlyTotals');
vi.mock('./api/transactions/import');

function mockResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

function mockRequest(authorization?: string) {
  return { headers: { authorization } } as unknown as Request;
}

describe('Server middleware', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('verifyToken', () => {
    it('should reject requests without a valid token', () => {
      vi.mocked(isTokenValid).mockReturnValue(false);
      const res = mockResponse();
      const next = vi.fn();

      verifyToken(mockRequest(), res as unknown as Response, next);

      expect(res.status).toHaveBeenCalledWith(401);
      expect(res.json).toHaveBeenCalledWith({ message: 'Invalid token' });
      expect(next).not.toHaveBeenCalled();
    });

    it('should attach the user id and continue', () => {
      vi.mocked(isTokenValid).mockReturnValue(7);
      const req = mockRequest('test-token');
      const next = vi.fn();

      verifyToken(req, mockResponse() as unknown as Response, next);

      expect(isTokenValid).toHaveBeenCalledWith('test-token');
      expect(req.userId).toBe(7);
      expect(next).toHaveBeenCalledTimes(1);
    });
  });

  describe('sendError', () => {
    it('should use the status of an ApiError', () => {
      const res = mockResponse();

      sendError(res as unknown as Response, new ApiError('Invalid months', 400));

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({ error: 'Invalid months' });
    });

    it('should answer 404 for missing items', () => {
      const res = mockResponse();

      sendError(res as unknown as Response, new Error('Item with id acc-x not found'));

      expect(res.status).toHaveBeenCalledWith(404);
    });

    it('should log and answer 500 for anything else', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      const res = mockResponse();

      sendError(res as unknown as Response, 'boom');

      expect(consoleError).toHaveBeenCalledWith('boom');
      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith({ error: 'Unknown error' });
      consoleError.mockRestore();
    });
  });

  describe('handle', () => {
    it('should send the handler result as JSON', async () => {
      const res = mockResponse();

      await handle(async () => ({ ok: true }))(mockRequest(), res as unknown as Response);

      expect(res.json).toHaveBeenCalledWith({ ok: true });
      expect(res.status).not.toHaveBeenCalled();
    });

    it('should send handler failures as errors', async () => {
      const res = mockResponse();

      await handle(() => {
        throw new Error("Invalid date '2024-02-30'");
      })(mockRequest(), res as unknown as Response);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({ error: "Invalid date '2024-02-30'" });
    });
  });
});
