import { NextFunction } from 'express';
import { authenticate, extractBearerToken } from '../../src/middleware/auth/auth.middleware';
import { validate } from '../../src/middleware/validation.middleware';
import { idParamsSchema } from '../../src/schemas/common.schema';
import { createInvoiceSchema } from '../../src/schemas/financial/invoice.schema';
import { AuthSession, IdentityProvider, RegistrationResult } from '../../src/services/auth/identity.service';
import { AuthenticationError } from '../../src/utils/errors';
import { mockRequest, mockResponse } from '../helpers/http-mocks';
import { TEST_USER_ID } from '../setup';

const CLIENT_ID = 'b1e2c3d4-5f6a-4b7c-8d9e-0f1a2b3c4d5e';

class TokenIdentityProvider implements IdentityProvider {
  async getUserId(accessToken: string): Promise<string> {
    if (accessToken === 'test-token') return TEST_USER_ID;
    if (accessToken === 'broken-token') throw new Error('identity service unreachable');
    throw new AuthenticationError();
  }

  async register(): Promise<RegistrationResult> {
    throw new AuthenticationError('not used');
  }

  async login(): Promise<AuthSession> {
    throw new AuthenticationError('not used');
  }
}

describe('validate', () => {
  it('should replace the body with the converted value', () => {
    const req = mockRequest({
      body: {
        client_id: CLIENT_ID,
        invoice_number: ' INV-2024-001 ',
        invoice_date: '2024-01-15',
        due_date: '2024-02-15',
        line_items: [{ description: 'Web Development', quantity: 40, unit_rate: '150.00', note: 'dropped' }],
        total: '999',
      },
    });
    const { res, status } = mockResponse();
    const next: NextFunction = jest.fn();

    validate(createInvoiceSchema)(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(status).not.toHaveBeenCalled();
    expect(req.body).toEqual({
      client_id: CLIENT_ID,
      invoice_number: 'INV-2024-001',
      invoice_date: '2024-01-15',
      due_date: '2024-02-15',
      tax_rate: '0',
      line_items: [{ description: 'Web Development', quantity: '40', unit_rate: '150.00' }],
    });
  });

  it('should respond 400 with every failing field', () => {
    const req = mockRequest({
      body: {
        client_id: CLIENT_ID,
        invoice_number: 'INV-2024-001',
        invoice_date: '2024-01-15',
        due_date: '15/02/2024',
      },
    });
    const { res, status, json } = mockResponse();
    const next: NextFunction = jest.fn();

    validate(createInvoiceSchema)(req, res, next);

    expect(next).not.toHaveBeenCalled();
    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      message: 'Validation failed',
      details: '"due_date" must be a date in YYYY-MM-DD format, "line_items" is required',
    });
  });

  it('should validate route parameters', () => {
    const req = mockRequest({ params: { id: 'not-a-uuid' } });
    const { res, status, json } = mockResponse();

    validate(idParamsSchema, 'params')(req, res, jest.fn());

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({ message: 'Validation failed', details: '"id" must be a valid GUID' });
  });
});

describe('extractBearerToken', () => {
  it('should read the token case-insensitively', () => {
    expect(extractBearerToken(mockRequest({ headers: { authorization: 'bearer test-token' } }))).toBe('test-token');
  });

  it('should return null for another scheme', () => {
    expect(extractBearerToken(mockRequest({ headers: { authorization: 'Basic dGVzdA==' } }))).toBeNull();
    expect(extractBearerToken(mockRequest())).toBeNull();
  });
});

describe('authenticate', () => {
  const middleware = authenticate(new TokenIdentityProvider());

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should store the user id and continue', async () => {
    const { res } = mockResponse();
    const next: NextFunction = jest.fn();

    await middleware(mockRequest({ headers: { authorization: 'Bearer test-token' } }), res, next);

    expect(res.locals.userId).toBe(TEST_USER_ID);
    expect(next).toHaveBeenCalledWith();
  });

  it('should challenge a request without a token', async () => {
    const { res, status, json, setHeader } = mockResponse();
    const next: NextFunction = jest.fn();

    await middleware(mockRequest(), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'Bearer');
    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({ message: 'Not authenticated', code: 'AUTHENTICATION_ERROR' });
  });

  it('should reject a token the identity provider refuses', async () => {
    const { res, status, json } = mockResponse();

    await middleware(mockRequest({ headers: { authorization: 'Bearer expired-token' } }), res, jest.fn());

    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({
      message: 'Invalid authentication credentials',
      code: 'AUTHENTICATION_ERROR',
    });
  });

  it('should log unexpected identity failures', async () => {
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const { res, status } = mockResponse();

    await middleware(mockRequest({ headers: { authorization: 'Bearer broken-token' } }), res, jest.fn());

    expect(status).toHaveBeenCalledWith(401);
    expect(consoleError).toHaveBeenCalledTimes(1);
  });
});
